export class EncodingError extends Error {
  constructor(
    message: string,
    readonly eventIndex?: number
  ) {
    super(eventIndex === undefined ? message : `event[${eventIndex}]: ${message}`);
    this.name = "EncodingError";
  }
}

export class IcsParseError extends Error {
  constructor(
    message: string,
    readonly line?: number
  ) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "IcsParseError";
  }
}
