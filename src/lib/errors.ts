export class UnsupportedFormatError extends Error {
  constructor(readonly extension: string) {
    super(`Unsupported file format: ${extension}`);
    this.name = "UnsupportedFormatError";
  }
}

export class CompletionNotConfiguredError extends Error {
  constructor() {
    super("Missing OPENAI_API_KEY");
    this.name = "CompletionNotConfiguredError";
  }
}
