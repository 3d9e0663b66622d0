/**
 * Error Types
 */
export enum ErrorType {
  INVALID_PARAMETER = 'invalid_parameter',
  PRECONDITION_VIOLATION = 'precondition_violation',
  SUBSYSTEM_FAILURE = 'subsystem_failure',
  CONFIGURATION_ERROR = 'configuration_error',
  OPERATION_ABORTED = 'operation_aborted',
  LISTENER_FAILURE = 'listener_failure',
  EMERGENCY_STOP = 'emergency_stop'
}

/**
 * Descriptor carried by the `error` event
 */
export interface ErrorEventPayload {
  type: ErrorType;
  message: string;
  operation?: string;
  timestamp: number;
  context: Record<string, unknown>;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Base error for the light source controller
 */
export class LightSourceError extends Error {
  public readonly code: ErrorType;
  public readonly operation?: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    code: ErrorType,
    message: string,
    operation?: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'LightSourceError';
    this.code = code;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LightSourceError);
    }
  }

  toEventPayload(): ErrorEventPayload {
    return {
      type: this.code,
      message: this.message,
      operation: this.operation,
      timestamp: this.timestamp.getTime(),
      context: { ...this.context }
    };
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack
    };
  }
}

/**
 * Rejected emission or power parameter
 */
export class InvalidParameterError extends LightSourceError {
  constructor(
    message: string,
    field?: string,
    value?: unknown
  ) {
    super(
      ErrorType.INVALID_PARAMETER,
      message,
      undefined,
      { field, value }
    );
    this.name = 'InvalidParameterError';
  }
}

/**
 * Operation invoked from a state that does not allow it
 */
export class PreconditionViolationError extends LightSourceError {
  constructor(
    message: string,
    operation: string,
    currentState?: string,
    expectedStates: string[] = []
  ) {
    super(
      ErrorType.PRECONDITION_VIOLATION,
      message,
      operation,
      { currentState, expectedStates }
    );
    this.name = 'PreconditionViolationError';
  }
}

/**
 * Collaborator call that rejected or reported failure
 */
export class SubsystemFailureError extends LightSourceError {
  constructor(
    message: string,
    operation: string,
    subsystems: string[],
    cause?: unknown
  ) {
    super(
      ErrorType.SUBSYSTEM_FAILURE,
      message,
      operation,
      cause === undefined ? { subsystems } : { subsystems, cause: describeError(cause) }
    );
    this.name = 'SubsystemFailureError';
  }
}

/**
 * Invalid controller configuration
 */
export class ConfigurationError extends LightSourceError {
  public readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = []
  ) {
    super(
      ErrorType.CONFIGURATION_ERROR,
      message,
      undefined,
      { issues }
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Long-running operation interrupted by a shutdown
 */
export class OperationAbortedError extends LightSourceError {
  constructor(operation: string) {
    super(
      ErrorType.OPERATION_ABORTED,
      `${operation} was interrupted`,
      operation
    );
    this.name = 'OperationAbortedError';
  }
}

/**
 * Event listener that threw during dispatch
 */
export class ListenerFailureError extends LightSourceError {
  constructor(
    event: string,
    cause: unknown
  ) {
    super(
      ErrorType.LISTENER_FAILURE,
      `Listener for ${event} failed: ${describeError(cause)}`,
      undefined,
      { event }
    );
    this.name = 'ListenerFailureError';
  }
}

export class EmergencyStopError extends LightSourceError {
  constructor(reason: string) {
    super(
      ErrorType.EMERGENCY_STOP,
      `Emergency stop: ${reason}`,
      'emergencyStop',
      { reason }
    );
    this.name = 'EmergencyStopError';
  }
}
