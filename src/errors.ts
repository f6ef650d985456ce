import { type ZodError } from 'zod';

/**
 * Shared error factory for the tangram geometry kernel.
 *
 * Kernel code raises or returns `GeometryError` values built here so the wording
 * of every failure lives in one place. Tool handlers convert failures into the
 * structured MCP error response shape, allowing them to do:
 *   return errors.invalidArgument('geometry area requires "vertices".');
 */

/**
 * The closed set of kernel failure categories.
 *
 * - `InvalidShape`: fewer than 3 vertices, or an area that is non-positive or out of bounds.
 * - `DegenerateGeometry`: zero-length segments or zero-area polygons where a measure needs area.
 * - `InvalidConfiguration`: a tolerance, unit, or snap angle that is not a finite positive number.
 * - `InvalidPieceData`: serialized piece data that does not match the persisted shape.
 */
export type GeometryErrorKind =
    | 'InvalidShape'
    | 'DegenerateGeometry'
    | 'InvalidConfiguration'
    | 'InvalidPieceData';

export class GeometryError extends Error {
    readonly kind: GeometryErrorKind;

    constructor(kind: GeometryErrorKind, message: string) {
        super(message);
        this.name = 'GeometryError';
        this.kind = kind;
    }
}

/**
 * Outcome of a fallible validation entry point.
 */
export type ValidationResult = { ok: true } | { ok: false; error: GeometryError };

export const VALID: ValidationResult = { ok: true };

export function invalid(error: GeometryError): ValidationResult {
    return { ok: false, error };
}

// ----------------------------------------------------------------------------
// shapes
// ----------------------------------------------------------------------------

export function tooFewVertices(count: number): GeometryError {
    return new GeometryError('InvalidShape', `Polygon needs at least 3 vertices, got ${String(count)}.`);
}

export function nonPositiveArea(area: number): GeometryError {
    return new GeometryError('InvalidShape', `Polygon area ${area.toFixed(3)} is not positive.`);
}

export function areaOutOfBounds(shape: string, area: number, min: number, max: number): GeometryError {
    return new GeometryError(
        'InvalidShape',
        `Shape '${shape}' area ${area.toFixed(2)} is outside the expected range [${min.toFixed(2)}, ${max.toFixed(2)}].`,
    );
}

export function areaTooSmall(area: number, min: number): GeometryError {
    return new GeometryError('InvalidShape', `Polygon area ${area.toFixed(3)} is below the minimum of ${String(min)}.`);
}

export function verticesTooClose(index: number, next: number, distance: number, min: number): GeometryError {
    return new GeometryError(
        'InvalidShape',
        `Vertices ${String(index)} and ${String(next)} are ${distance.toFixed(2)} apart, closer than the minimum separation ${String(min)}.`,
    );
}

export function totalAreaMismatch(total: number, expected: number): GeometryError {
    return new GeometryError(
        'InvalidShape',
        `Shape set area ${total.toFixed(3)} does not match the canonical total ${expected.toFixed(3)}.`,
    );
}

// ----------------------------------------------------------------------------
// geometry
// ----------------------------------------------------------------------------

export function zeroAreaPolygon(count: number): GeometryError {
    return new GeometryError('DegenerateGeometry', `Polygon with ${String(count)} vertices has zero area.`);
}

// ----------------------------------------------------------------------------
// configuration & persistence
// ----------------------------------------------------------------------------

export function invalidConfiguration(details: string): GeometryError {
    return new GeometryError('InvalidConfiguration', `Invalid configuration: ${details}`);
}

export function invalidPieceData(details: string): GeometryError {
    return new GeometryError('InvalidPieceData', `Invalid piece data: ${details}`);
}

/**
 * Flattens schema issues into `path: message` pairs joined by "; ".
 */
export function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

export function pieceLayoutFileNotFound(path: string): string {
    return `Piece layout file not found: ${path}`;
}

// ----------------------------------------------------------------------------
// MCP tool responses
// ----------------------------------------------------------------------------

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object so the caller can read the text and self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

export function missingArgument(tool: string, action: string, argument: string): DomainErrorResponse {
    return invalidArgument(`${tool} ${action} requires "${argument}".`);
}

export function unknownAction(tool: string, action: string): DomainErrorResponse {
    return invalidArgument(`Unknown ${tool} action: ${action}`);
}

/**
 * Converts a thrown value into a DomainErrorResponse, keeping the message of Error instances.
 */
export function fromThrown(error: unknown): DomainErrorResponse {
    return domainError(error instanceof Error ? error.message : String(error));
}
