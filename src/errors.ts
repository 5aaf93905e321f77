export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.missing = missing;
  }
}

export class RemoteFetchError extends PipelineError {
  readonly statusCode: number | null;
  readonly body: string;

  constructor(statusCode: number | null, body: string, message?: string, cause?: unknown) {
    super(message ?? `API call failed ${statusCode ?? 'without response'} = ${body}`, { cause });
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class StorageConnectionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class StorageWriteError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
