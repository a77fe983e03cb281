// Re-export all types for easy imports
export * from './catalog';
export * from './embedding';
export * from './taxonomy';

// Common error types
export class ValidationError extends Error {
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ProcessingError extends Error {
  constructor(
    message: string,
    public retryable: boolean = true,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ProcessingError';
  }
}

export class CircuitBreakerError extends Error {
  constructor(message: string, public service: string) {
    super(message);
    this.name = 'CircuitBreakerError';
  }
}

/** Two vectors of different length were compared or blended. */
export class DimensionMismatchError extends Error {
  constructor(public expected: number, public actual: number) {
    super(`Vector dimension mismatch: ${expected} vs ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

/** A query vector from one embedding model was matched against a tree built by another. */
export class EmbeddingSpaceMismatchError extends Error {
  constructor(public expected: string, public actual: string) {
    super(`Query embedded with "${actual}" cannot be matched against a "${expected}" taxonomy tree`);
    this.name = 'EmbeddingSpaceMismatchError';
  }
}
