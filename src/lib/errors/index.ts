/**
 * Error types barrel export
 */
export {
    DataError,
    QueryError,
    ConnectionError,
    DataTransformError,
    isDataError,
    wrapDatabaseError,
} from './data-errors';
export {
    InvalidViewportError,
    InvalidCoordinateError,
    isInvalidViewportError,
    type ValidationIssue,
} from './validation-errors';
