export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export class EmptyInputError extends Error {
  constructor(message = "Message collection is empty; nothing to analyse") {
    super(message);
    this.name = "EmptyInputError";
  }
}

export class AnalysisAbortedError extends Error {
  constructor(stage: string) {
    super(`Analysis run cancelled before stage "${stage}"`);
    this.name = "AnalysisAbortedError";
  }
}
