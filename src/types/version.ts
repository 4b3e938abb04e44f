export type ExecutableVariant = 'Editor' | 'Console';

export interface VersionCandidate {
  versionIdentifier: string; // bare directory name
  directoryPath: string;
}

export interface ExecutableEntry {
  path: string;
  variant: ExecutableVariant;
}
