/**
 * Error Handling Types for the column cascading engine
 *
 * Provides:
 * - Error categories (graph, data, configuration, resource)
 * - Error classes raised by the engine and the store
 * - Structured error responses and logging
 */

// ==================== Error Category Enum ====================

/**
 * Error category enum for categorizing errors
 */
export enum ErrorCategory {
  /** Missing or unknown artifact / stage in the graph */
  GRAPH = 'GRAPH',
  /** Bad column data (blank names, unmapped types) */
  DATA = 'DATA',
  /** Invalid relation kinds or upstream declarations */
  CONFIGURATION = 'CONFIGURATION',
  /** Store locked, unreadable or malformed */
  RESOURCE = 'RESOURCE',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Error response structure reported to the caller
 */
export interface ErrorResponse {
  /** Error category */
  category: ErrorCategory;
  /** Message safe to show to an operator */
  userMessage: string;
  /** Technical details (for logging) */
  technicalDetails?: string;
  /** Whether the whole run must stop */
  fatal: boolean;
  /** Suggested actions for the operator */
  suggestedActions: string[];
  /** Error code for programmatic handling */
  errorCode: string;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Correlation ID for tracking */
  correlationId?: string;
}

// ==================== Error Handlers ====================

/**
 * Default error responses for each category
 */
export const ERROR_HANDLERS: Record<ErrorCategory, Omit<ErrorResponse, 'technicalDetails' | 'timestamp' | 'correlationId'>> = {
  [ErrorCategory.GRAPH]: {
    category: ErrorCategory.GRAPH,
    userMessage: 'An artifact or stage referenced by the pipeline model could not be found.',
    fatal: false,
    suggestedActions: ['Check upstream_artifact ids', 'Check stage_id of the artifact'],
    errorCode: 'ERR_GRAPH',
  },
  [ErrorCategory.DATA]: {
    category: ErrorCategory.DATA,
    userMessage: 'A column could not be derived from its upstream definition.',
    fatal: false,
    suggestedActions: ['Fill in column_name', 'Add a data type mapping'],
    errorCode: 'ERR_DATA',
  },
  [ErrorCategory.CONFIGURATION]: {
    category: ErrorCategory.CONFIGURATION,
    userMessage: 'The upstream declaration of an artifact is not valid.',
    fatal: false,
    suggestedActions: ['Check relation_type values', 'Match relation_type list to upstream_artifact list'],
    errorCode: 'ERR_CONFIGURATION',
  },
  [ErrorCategory.RESOURCE]: {
    category: ErrorCategory.RESOURCE,
    userMessage: 'The pipeline store is locked or could not be read.',
    fatal: true,
    suggestedActions: ['Close other sessions using the store', 'Retry later'],
    errorCode: 'ERR_RESOURCE',
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    userMessage: 'Something unexpected happened while cascading.',
    fatal: false,
    suggestedActions: ['Re-run the cascade', 'Run the cleanup pass'],
    errorCode: 'ERR_UNKNOWN',
  },
};

// ==================== Custom Error Classes ====================

/**
 * Base error class for cascading errors
 */
export class CascadeError extends Error {
  public readonly category: ErrorCategory;
  public readonly code: string;
  public readonly correlationId: string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    code?: string,
    correlationId?: string
  ) {
    super(message);
    this.name = 'CascadeError';
    this.category = category;
    this.code = code || ERROR_HANDLERS[category].errorCode;
    this.correlationId = correlationId || generateCorrelationId();
    this.timestamp = new Date();
  }

  /**
   * Convert to ErrorResponse for reporting
   */
  toErrorResponse(): ErrorResponse {
    const handler = ERROR_HANDLERS[this.category];
    return {
      ...handler,
      errorCode: this.code,
      technicalDetails: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }
}

/**
 * Raised when a cascade targets an artifact that does not exist
 */
export class ArtifactNotFoundError extends CascadeError {
  public readonly artifactId: string;

  constructor(artifactId: string) {
    super(`Artifact ${artifactId} not found`, ErrorCategory.GRAPH, 'ERR_ARTIFACT_NOT_FOUND');
    this.name = 'ArtifactNotFoundError';
    this.artifactId = artifactId;
  }
}

/**
 * Raised when the stage of a target artifact does not exist
 */
export class StageNotFoundError extends CascadeError {
  public readonly stageId: string;

  constructor(stageId: string, artifactId: string) {
    super(`Stage ${stageId} of artifact ${artifactId} not found`, ErrorCategory.GRAPH, 'ERR_STAGE_NOT_FOUND');
    this.name = 'StageNotFoundError';
    this.stageId = stageId;
  }
}

/**
 * Raised when an upstream declaration cannot be parsed
 */
export class UpstreamReferenceError extends CascadeError {
  public readonly artifactId: string;

  constructor(artifactId: string, message: string) {
    super(message, ErrorCategory.CONFIGURATION, 'ERR_UPSTREAM_REFERENCE');
    this.name = 'UpstreamReferenceError';
    this.artifactId = artifactId;
  }
}

/**
 * Raised when the store is locked or cannot be opened
 */
export class StoreUnavailableError extends CascadeError {
  public readonly storePath: string;

  constructor(storePath: string, message: string) {
    super(message, ErrorCategory.RESOURCE, 'ERR_STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
    this.storePath = storePath;
  }
}

/**
 * Raised when a table of the store holds an invalid row
 */
export class StoreFormatError extends CascadeError {
  public readonly table: string;
  public readonly row: number;

  constructor(table: string, row: number, message: string) {
    super(`Invalid row ${row} in table ${table}: ${message}`, ErrorCategory.RESOURCE, 'ERR_STORE_FORMAT');
    this.name = 'StoreFormatError';
    this.table = table;
    this.row = row;
  }
}

// ==================== Utility Functions ====================

/**
 * Generate a correlation ID for error tracking
 */
export function generateCorrelationId(): string {
  return `err-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Categorize an error based on its type and message
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof CascadeError) {
    return error.category;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('ebusy') || message.includes('eacces') || message.includes('locked') || message.includes('enoent')) {
      return ErrorCategory.RESOURCE;
    }
    if (message.includes('not found')) {
      return ErrorCategory.GRAPH;
    }
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Create an ErrorResponse from any error
 */
export function createErrorResponse(
  error: unknown,
  correlationId?: string
): ErrorResponse {
  if (error instanceof CascadeError) {
    return error.toErrorResponse();
  }

  const category = categorizeError(error);
  const handler = ERROR_HANDLERS[category];
  const technicalDetails = error instanceof Error ? error.message : String(error);

  return {
    ...handler,
    technicalDetails,
    timestamp: new Date(),
    correlationId: correlationId || generateCorrelationId(),
  };
}

/**
 * Whether an error must abort a whole run instead of a single artifact
 */
export function isFatalError(error: unknown): boolean {
  return ERROR_HANDLERS[categorizeError(error)].fatal;
}

/**
 * Log error with its category and context
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const errorResponse = createErrorResponse(error);

  console.error('[CascadeError]', {
    category: errorResponse.category,
    errorCode: errorResponse.errorCode,
    correlationId: errorResponse.correlationId,
    timestamp: errorResponse.timestamp,
    technicalDetails: errorResponse.technicalDetails,
    context,
  });
}
