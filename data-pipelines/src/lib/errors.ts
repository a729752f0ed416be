export class MissingInputDirError extends Error {
  constructor(public readonly dir: string, cause?: unknown) {
    super(`Input directory not found or unreadable: ${dir}`, { cause });
    this.name = 'MissingInputDirError';
  }
}

export class InvalidDateError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid date: ${value} (expected YYYY-MM-DD)`);
    this.name = 'InvalidDateError';
  }
}

export class UnsupportedCrsError extends Error {
  constructor(public readonly epsg: number) {
    super(`No projection definition for EPSG:${epsg}`);
    this.name = 'UnsupportedCrsError';
  }
}
