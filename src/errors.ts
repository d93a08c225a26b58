export type RelayErrorCode =
  | 'storage_write_failed'
  | 'storage_read_failed'
  | 'artifact_not_found'
  | 'artifact_protected'
  | 'no_playable_candidate';

export class RelayError extends Error {
  constructor(
    public readonly code: RelayErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StorageWriteError extends RelayError {
  constructor(public readonly path: string, cause: unknown) {
    super('storage_write_failed', `failed to write audio artifact at ${path}`, { cause });
  }
}

export class StorageReadError extends RelayError {
  constructor(public readonly root: string, cause: unknown) {
    super('storage_read_failed', `failed to read audio store at ${root}`, { cause });
  }
}

export class NotFoundError extends RelayError {
  constructor(public readonly id: string) {
    super('artifact_not_found', `audio artifact not found: ${id}`);
  }
}

export class ProtectedArtifactError extends RelayError {
  constructor(public readonly id: string, public readonly path: string) {
    super('artifact_protected', `audio artifact is protected: ${id}`);
  }
}

export class NoPlayableCandidateError extends RelayError {
  constructor(public readonly artifactId: string, public readonly attempted: string[]) {
    super(
      'no_playable_candidate',
      attempted.length === 0
        ? `no player available for artifact ${artifactId}`
        : `no player could render artifact ${artifactId} (tried: ${attempted.join(', ')})`,
    );
  }
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
