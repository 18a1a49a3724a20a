export type ResolverStrategy = 'page-scrape' | 'api-redirect';

export interface ManifestFields {
  version: string | null;
  sourceUrl: string | null;
  sha256: string | null;
}

export interface ReleaseDescriptor {
  version: string;
  url: string;
  hash: string;
}

export interface ArtifactNamePattern {
  name: string;
  arch: string;
  extension: string;
}

export interface BuildOutputLayout {
  outLink: string;
  executable: string;
  icon: string;
  desktopEntry: string;
}

export interface UpdaterConfig {
  manifestFile: string;
  packageAttr: string;
  strategy: ResolverStrategy;
  downloadPageUrl: string;
  apiEndpointPattern: string;
  artifactUrlPattern: string;
  sourceUrlPrefix: string;
  artifact: ArtifactNamePattern;
  build: BuildOutputLayout;
  requiredCommands: string[];
  networkTimeoutMs: number;
  lockStaleMs: number;
  userAgent: string;
  logDir: string | null;
}

export type UpdaterErrorCode =
  | 'dependency_missing'
  | 'wrong_directory'
  | 'resolution_failed'
  | 'version_unresolved'
  | 'hash_fetch_failed'
  | 'build_failed'
  | 'lock_unavailable';

export interface BuildVerificationReport {
  executableFound: boolean;
  builtVersion: string | null;
  versionMatches: boolean;
  iconPresent: boolean;
  desktopEntryPresent: boolean;
  warnings: string[];
}

export type UpdateOutcome =
  | {
      status: 'up-to-date';
      version: string | null;
      url: string;
    }
  | {
      status: 'updated';
      previous: ManifestFields;
      release: ReleaseDescriptor;
      verification: BuildVerificationReport;
      warnings: string[];
    };

export interface WorkflowSimulationReport {
  updateSucceeded: boolean;
  updateError: string | null;
  changed: boolean;
  originalVersion: string | null;
  newVersion: string | null;
  diff: string[];
  plannedActions: string[];
  restored: boolean;
}
