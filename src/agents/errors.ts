export class ActionValidationError extends Error {
  constructor(
    message: string,
    public tool?: string,
  ) {
    super(message);
    this.name = 'ActionValidationError';
  }
}

export class ModelResponseParseError extends Error {
  constructor(
    message: string,
    public raw: string,
  ) {
    super(message);
    this.name = 'ModelResponseParseError';
  }
}
