/**
 * Input validation errors raised before any store query is issued
 */

export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Viewport rejected: non-positive span, non-finite values or out-of-range center.
 * Callers are expected to clamp before handing a viewport to the engine.
 */
export class InvalidViewportError extends Error {
    public readonly code = 'INVALID_VIEWPORT';
    public readonly issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        super(`Invalid viewport: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
        this.name = 'InvalidViewportError';
        this.issues = issues;
    }
}

/**
 * Coordinate or precision outside the encodable range
 */
export class InvalidCoordinateError extends Error {
    public readonly code = 'INVALID_COORDINATE';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidCoordinateError';
    }
}

export function isInvalidViewportError(error: unknown): error is InvalidViewportError {
    return error instanceof InvalidViewportError;
}
