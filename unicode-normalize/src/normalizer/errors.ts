/**
 * Raised when text handed to the normalizer is not well-formed Unicode,
 * i.e. it contains an unpaired surrogate code unit.
 */
export class InvalidInputError extends Error {
  constructor(public readonly index: number) {
    super(`Invalid Unicode text: unpaired surrogate at index ${index}`);
    this.name = 'InvalidInputError';
  }
}

/**
 * Input file for a normalization run does not exist
 */
export class FileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Input and output of a normalization run are the same file
 */
export class SameFileError extends Error {
  constructor(
    public readonly inputPath: string,
    public readonly outputPath: string
  ) {
    super(`Input and output are the same file: ${inputPath}`);
    this.name = 'SameFileError';
  }
}
