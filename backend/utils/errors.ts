export class EmptyLessonPoolError extends Error {
  constructor() {
    super("No lessons available for selection");
    this.name = "EmptyLessonPoolError";
  }
}

export class OutputDocumentError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${message} (${filePath})`);
    this.name = "OutputDocumentError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
