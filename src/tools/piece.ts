import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Configuration } from '../config.js';
import { type Logger, silentLogger } from '../logger.js';
import { SHAPE_KINDS } from '../types/shape-kind.js';
import { decodePieceColor, FALLBACK_PIECE_COLOR } from '../types/piece-color.js';
import { Piece } from '../classes/piece.js';
import { pointSchema, pieceDataSchema, jsonResult, plainPoints } from './shared.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `piece` tool.
 */
const pieceInputSchema = {
    action: z.enum([
        'create',
        'vertices',
        'bounding_box',
        'translate',
        'move_to',
        'rotate_by',
        'rotate_to',
        'reset',
        'snap_rotation',
        'describe',
    ]).describe('Piece action to perform'),
    piece: pieceDataSchema.optional().describe('Serialized piece (all actions except create)'),
    kind: z.enum(SHAPE_KINDS).optional().describe('Shape kind for create'),
    position: pointSchema.optional().describe('Position for create, move_to and reset'),
    rotation: z.number().optional().describe('Initial rotation in radians for create'),
    color: z.string().optional().describe('Color tag for create; unknown tags fall back to blue'),
    dx: z.number().optional().describe('Horizontal offset for translate'),
    dy: z.number().optional().describe('Vertical offset for translate'),
    angle: z.number().optional().describe('Radians for rotate_by and rotate_to'),
    snap_angle: z.number().positive().optional().describe('Snap increment for snap_rotation (defaults to the configured snap)'),
};

type PieceArgs = z.infer<z.ZodObject<typeof pieceInputSchema>>;

/**
 * Registers the `piece` tool on the MCP server.
 */
export function registerPieceTool(server: McpServer, config: Configuration, logger: Logger = silentLogger): void {
    server.registerTool(
        'piece',
        {
            title: 'Piece',
            description: 'Create and transform tangram pieces. Every transform returns a new serialized piece with the same id. Actions: create, vertices, bounding_box, translate, move_to, rotate_by, rotate_to, reset, snap_rotation, describe.',
            inputSchema: pieceInputSchema,
        },
        (args) => handlePiece(args, config, logger),
    );
}

function handlePiece(args: PieceArgs, config: Configuration, logger: Logger) {
    if (args.action === 'create') {
        if (!args.kind) {
            return errors.missingArgument('piece', 'create', 'kind');
        }
        const piece = Piece.create(
            {
                kind: args.kind,
                position: args.position ?? { x: 0, y: 0 },
                rotation: args.rotation,
                color: args.color === undefined ? FALLBACK_PIECE_COLOR : decodePieceColor(args.color),
            },
            config,
        );
        return jsonResult({ piece: piece.toJSON() });
    }

    if (!args.piece) {
        return errors.missingArgument('piece', args.action, 'piece');
    }

    let piece: Piece;
    try {
        piece = Piece.fromJSON(args.piece, config);
    } catch (e: unknown) {
        logger.warn('piece: rejected piece data', { error: String(e) });
        return errors.fromThrown(e);
    }

    return handlePieceAction(args, piece, config);
}

function handlePieceAction(args: PieceArgs, piece: Piece, config: Configuration) {
    const missing = (argument: string) => errors.missingArgument('piece', args.action, argument);

    switch (args.action) {
        case 'vertices':
            return jsonResult({ vertices: plainPoints(piece.worldVertices()) });
        case 'bounding_box':
            return jsonResult({ bounding_box: piece.boundingBox() });
        case 'translate':
            if (args.dx === undefined) return missing('dx');
            if (args.dy === undefined) return missing('dy');
            return jsonResult({ piece: piece.translated(args.dx, args.dy).toJSON() });
        case 'move_to':
            if (!args.position) return missing('position');
            return jsonResult({ piece: piece.movedTo(args.position).toJSON() });
        case 'rotate_by':
            if (args.angle === undefined) return missing('angle');
            return jsonResult({ piece: piece.rotatedBy(args.angle).toJSON() });
        case 'rotate_to':
            if (args.angle === undefined) return missing('angle');
            return jsonResult({ piece: piece.rotatedTo(args.angle).toJSON() });
        case 'reset':
            return jsonResult({ piece: piece.reset(args.position).toJSON() });
        case 'snap_rotation': {
            const snapped = piece.snappedRotation(args.snap_angle ?? config.rotationSnap);
            return jsonResult({ piece: snapped.toJSON(), changed: snapped !== piece });
        }
        case 'describe':
            return jsonResult({ description: piece.description, status: piece.statusString, details: piece.debugDescription });
        default:
            return errors.unknownAction('piece', String(args.action));
    }
}
