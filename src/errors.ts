// ABOUTME: Error classes for fatal conditions in the dataset usage report
// ABOUTME: Per-query HTTP failures are outcomes, not errors, and never use these

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DatasetListError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'DatasetListError';
  }
}

export class ResponseParseError extends Error {
  constructor(message: string, public readonly query: string) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export class ResultTableError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'ResultTableError';
  }
}

export class ChartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChartError';
  }
}
