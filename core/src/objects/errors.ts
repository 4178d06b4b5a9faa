export class RecordNotFoundError extends Error {
  readonly code = 'record_not_found';
  readonly domainType: string;
  readonly id: string | number;

  constructor(domainType: string, id: string | number) {
    super(`Record not found: ${domainType}#${id}`);
    this.name = 'RecordNotFoundError';
    this.domainType = domainType;
    this.id = id;
  }
}

export class ObjectLoadError extends Error {
  readonly code = 'object_load_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ObjectLoadError';
    this.details = details;
  }
}
