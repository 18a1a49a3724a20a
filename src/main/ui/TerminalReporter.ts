import chalk from 'chalk';

export interface UpdateReporter {
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  detail(message: string): void;
}

interface TerminalReporterOptions {
  write?: (line: string) => void;
  colors?: boolean;
}

export class TerminalReporter implements UpdateReporter {
  private readonly write: (line: string) => void;
  private readonly paint: chalk.Chalk;

  constructor(options?: TerminalReporterOptions) {
    this.write = options?.write ?? ((line) => void process.stdout.write(`${line}\n`));
    const colors = options?.colors ?? process.stdout.isTTY === true;
    this.paint = new chalk.Instance({ level: colors ? 1 : 0 });
  }

  step(message: string): void {
    this.write(`${this.paint.blue('[STEP]')} ${message}`);
  }

  info(message: string): void {
    this.write(`${this.paint.blue('[INFO]')} ${message}`);
  }

  success(message: string): void {
    this.write(`${this.paint.green('[SUCCESS]')} ${message}`);
  }

  warning(message: string): void {
    this.write(`${this.paint.yellow('[WARNING]')} ${message}`);
  }

  error(message: string): void {
    this.write(`${this.paint.red('[ERROR]')} ${message}`);
  }

  detail(message: string): void {
    this.write(`  ${message}`);
  }
}
