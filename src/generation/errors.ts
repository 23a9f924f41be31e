export class InvalidPromptError extends Error {
  readonly httpStatus = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidPromptError";
  }
}

export class ScriptGenerationError extends Error {
  readonly httpStatus = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScriptGenerationError";
  }
}
