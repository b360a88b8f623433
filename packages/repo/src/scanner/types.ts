export interface ScanOptions {
  /** Lowercase extensions including the dot, e.g. `.py`; case-insensitive match */
  extensions?: readonly string[];
  /** gitignore-style patterns, applied on top of DEFAULT_IGNORES */
  excludes?: readonly string[];
}

export interface ScannedFile {
  /** POSIX path relative to the project root */
  path: string;
  absPath: string;
  sizeBytes: number;
}

export interface ProjectSnapshot {
  projectRoot: string;
  files: ScannedFile[];
  warnings: string[];
}
