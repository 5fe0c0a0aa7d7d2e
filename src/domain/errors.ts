export class VerseNotesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends VerseNotesError {}

export class EmptyIndexError extends VerseNotesError {
  constructor() {
    super(
      "No chunks found in the vector index. Run the pipeline first: ingest → parse → chunk → index.",
    );
  }
}

export class UpstreamDataError extends VerseNotesError {}

export class EmbeddingMismatchError extends VerseNotesError {
  constructor(
    readonly indexedVersion: string,
    readonly queryVersion: string,
  ) {
    super(
      `Index was built with embedding "${indexedVersion}" but queries use "${queryVersion}". Re-run the index stage.`,
    );
  }
}

export class JobStillRunningError extends VerseNotesError {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} is still running and cannot be removed.`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
