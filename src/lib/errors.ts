export class DeltaApiError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`Delta API error (${status}): ${body}`);
    this.name = "DeltaApiError";
    this.status = status;
  }
}

export class CatalogUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogUnavailableError";
  }
}

export class ChainPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChainPreconditionError";
  }
}
