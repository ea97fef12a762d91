export type InstallerErrorCode = 'ROOT_NOT_FOUND' | 'MANIFEST_INVALID' | 'DESTINATION_UNAVAILABLE';

/** A setup failure that stops the run before any entry is copied. */
export class InstallerError extends Error {
  constructor(message: string, readonly code: InstallerErrorCode) {
    super(message);
    this.name = 'InstallerError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
