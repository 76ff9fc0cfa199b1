/**
 * Core error hierarchy for the stagegate engine.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration is missing, invalid, or cannot be loaded/saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when a run state transition is invalid. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/** Raised when a record or user input fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

/** Raised when a startup precondition (services, key/value store, run directory) fails. */
export class StartupError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'STARTUP_ERROR', context);
        this.name = 'StartupError';
    }
}

/** Raised when task dependencies form a cycle. Fatal for the batch, never retried. */
export class DependencyCycleError extends AppError {
    public readonly cycle: string[];

    constructor(cycle: string[]) {
        super(`Dependency cycle detected: ${cycle.join(' → ')}`, 'DEPENDENCY_CYCLE', { cycle });
        this.name = 'DependencyCycleError';
        this.cycle = cycle;
    }
}

/** Raised when an external collaborator (handler, reviewer, store) fails. */
export class CollaboratorError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'COLLABORATOR_ERROR', context);
        this.name = 'CollaboratorError';
    }
}
