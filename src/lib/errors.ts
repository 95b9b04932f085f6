export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class ProfileNotFoundError extends NotFoundError {
  constructor(inmateId: string) {
    super('Rehabilitation profile for inmate', inmateId);
    this.name = 'ProfileNotFoundError';
  }
}

export class RecommendationNotFoundError extends NotFoundError {
  constructor(recommendationId: string) {
    super('Recommendation', recommendationId);
    this.name = 'RecommendationNotFoundError';
  }
}

/**
 * The predicted (or fallback) program category has no active catalog entry.
 * Fatal to the request; nothing is persisted.
 */
export class NoSuitableProgramError extends Error {
  public statusCode = 422;
  public category: string;

  constructor(category: string) {
    super(`No active program of type '${category}' is available`);
    this.name = 'NoSuitableProgramError';
    this.category = category;
  }
}
