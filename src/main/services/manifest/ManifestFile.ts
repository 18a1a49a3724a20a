import fs from 'node:fs';
import path from 'node:path';

export interface ManifestSnapshot {
  readonly filePath: string;
  readonly bytes: Buffer;
}

interface ManifestFileOptions {
  readFileSync?: (filePath: string) => Buffer;
  writeFileSync?: (filePath: string, data: Buffer | string) => void;
  existsSync?: (filePath: string) => boolean;
}

export class ManifestFile {
  readonly filePath: string;
  private readonly readFileSync: (filePath: string) => Buffer;
  private readonly writeFileSync: (filePath: string, data: Buffer | string) => void;
  private readonly existsSync: (filePath: string) => boolean;

  constructor(workDir: string, manifestFile: string, options?: ManifestFileOptions) {
    this.filePath = path.resolve(workDir, manifestFile);
    this.readFileSync = options?.readFileSync ?? ((filePath) => fs.readFileSync(filePath));
    this.writeFileSync = options?.writeFileSync ?? ((filePath, data) => fs.writeFileSync(filePath, data));
    this.existsSync = options?.existsSync ?? fs.existsSync;
  }

  get fileName(): string {
    return path.basename(this.filePath);
  }

  exists(): boolean {
    return this.existsSync(this.filePath);
  }

  readText(): string {
    return this.readFileSync(this.filePath).toString('utf-8');
  }

  writeText(text: string): void {
    this.writeFileSync(this.filePath, Buffer.from(text, 'utf-8'));
  }

  snapshot(): ManifestSnapshot {
    return {
      filePath: this.filePath,
      bytes: Buffer.from(this.readFileSync(this.filePath))
    };
  }

  restore(snapshot: ManifestSnapshot): void {
    if (snapshot.filePath !== this.filePath) {
      throw new Error(`Snapshot pertence a outro manifesto: ${snapshot.filePath}`);
    }
    this.writeFileSync(this.filePath, snapshot.bytes);
  }

  matches(snapshot: ManifestSnapshot): boolean {
    return this.readFileSync(this.filePath).equals(snapshot.bytes);
  }
}
