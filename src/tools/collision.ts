import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Configuration } from '../config.js';
import { type Logger, silentLogger } from '../logger.js';
import { Piece } from '../classes/piece.js';
import {
    pointInPolygon,
    segmentDistance,
    boxesIntersect,
    circleIntersectsPolygon,
    piecesNearPoint,
    sharedVertices,
} from '../algorithms/collision.js';
import { pointSchema, verticesSchema, rectSchema, pieceDataSchema, jsonResult, plainPoints } from './shared.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `collision` tool.
 */
const collisionInputSchema = {
    action: z.enum([
        'point_in_polygon',
        'segment_distance',
        'boxes_intersect',
        'circle_intersects_polygon',
        'pieces_near_point',
        'shared_vertices',
    ]).describe('Collision query to run'),
    point: pointSchema.optional().describe('Query point, or circle center for circle_intersects_polygon'),
    vertices: verticesSchema.optional().describe('Polygon vertex loop'),
    other_vertices: verticesSchema.optional().describe('Second polygon for shared_vertices'),
    start: pointSchema.optional().describe('Segment start for segment_distance'),
    end: pointSchema.optional().describe('Segment end for segment_distance'),
    box_a: rectSchema.optional().describe('First box for boxes_intersect'),
    box_b: rectSchema.optional().describe('Second box for boxes_intersect'),
    radius: z.number().nonnegative().optional().describe('Circle radius for circle_intersects_polygon'),
    pieces: z.array(pieceDataSchema).optional().describe('Serialized pieces for pieces_near_point'),
    max_distance: z.number().nonnegative().optional().describe('Distance limit for pieces_near_point'),
    tolerance: z.number().positive().optional().describe('Vertex match tolerance for shared_vertices (defaults to the configured tolerance)'),
};

type CollisionArgs = z.infer<z.ZodObject<typeof collisionInputSchema>>;

/**
 * Registers the `collision` tool on the MCP server.
 */
export function registerCollisionTool(server: McpServer, config: Configuration, logger: Logger = silentLogger): void {
    server.registerTool(
        'collision',
        {
            title: 'Collision',
            description: 'Point, box, segment and circle collision queries. Actions: point_in_polygon, segment_distance, boxes_intersect, circle_intersects_polygon, pieces_near_point, shared_vertices.',
            inputSchema: collisionInputSchema,
        },
        (args) => handleCollision(args, config, logger),
    );
}

function handleCollision(args: CollisionArgs, config: Configuration, logger: Logger) {
    const missing = (argument: string) => errors.missingArgument('collision', args.action, argument);

    switch (args.action) {
        case 'point_in_polygon':
            if (!args.point) return missing('point');
            if (!args.vertices) return missing('vertices');
            return jsonResult({ inside: pointInPolygon(args.point, args.vertices) });

        case 'segment_distance':
            if (!args.point) return missing('point');
            if (!args.start) return missing('start');
            if (!args.end) return missing('end');
            return jsonResult({ distance: segmentDistance(args.point, args.start, args.end, config, logger) });

        case 'boxes_intersect':
            if (!args.box_a) return missing('box_a');
            if (!args.box_b) return missing('box_b');
            return jsonResult({ intersects: boxesIntersect(args.box_a, args.box_b) });

        case 'circle_intersects_polygon':
            if (!args.point) return missing('point');
            if (args.radius === undefined) return missing('radius');
            if (!args.vertices) return missing('vertices');
            return jsonResult({
                intersects: circleIntersectsPolygon(args.point, args.radius, args.vertices, config, logger),
            });

        case 'pieces_near_point': {
            if (!args.pieces) return missing('pieces');
            if (!args.point) return missing('point');
            if (args.max_distance === undefined) return missing('max_distance');

            let pieces: Piece[];
            try {
                pieces = args.pieces.map((data) => Piece.fromJSON(data, config));
            } catch (e: unknown) {
                logger.warn('collision pieces_near_point: rejected piece data', { error: String(e) });
                return errors.fromThrown(e);
            }
            const near = piecesNearPoint(pieces, args.point, args.max_distance);
            return jsonResult({ ids: near.map((piece) => piece.id) });
        }

        case 'shared_vertices': {
            if (!args.vertices) return missing('vertices');
            if (!args.other_vertices) return missing('other_vertices');
            const tolerance = args.tolerance ?? config.vertexTolerance;
            return jsonResult({ vertices: plainPoints(sharedVertices(args.vertices, args.other_vertices, tolerance)) });
        }

        default:
            return errors.unknownAction('collision', String(args.action));
    }
}
