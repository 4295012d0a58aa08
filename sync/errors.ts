export class CycleError extends Error {
  constructor(readonly parentId: string, readonly childId: string, message: string) {
    super(message);
    this.name = 'CycleError';
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class FinalizedError extends Error {
  constructor(collectionId: string, action: string) {
    super(`Collection '${collectionId}' has already been finalized, cannot ${action}`);
    this.name = 'FinalizedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UploadError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'UploadError';
  }
}
