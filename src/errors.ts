export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly pageIndex: number,
    public readonly statusCode?: number,
    /** First few hundred characters of the response body, when there was one */
    public readonly body?: string
  ) {
    super(message);
    this.name = "TransportError";
  }

  get isRateLimit(): boolean {
    return this.statusCode === 429;
  }
}
