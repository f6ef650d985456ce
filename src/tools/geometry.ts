import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Configuration } from '../config.js';
import { type Logger, silentLogger } from '../logger.js';
import {
    polygonArea,
    polygonCentroid,
    boundingBox,
    transformPolygon,
    validatePolygon,
} from '../algorithms/polygon.js';
import { pointSchema, verticesSchema, jsonResult, plainPoints } from './shared.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `geometry` tool.
 */
const geometryInputSchema = {
    action: z.enum(['area', 'centroid', 'bounding_box', 'transform', 'validate']).describe(
        'Polygon measure or transform to perform'
    ),
    vertices: verticesSchema.describe('Polygon vertex loop, in order'),
    translation: pointSchema.optional().describe('Offset applied first (transform)'),
    rotation: z.number().optional().describe('Radians, about the translated centroid (transform)'),
    scale: z.number().positive().optional().describe('Uniform factor, about the rotated centroid (transform)'),
};

type GeometryArgs = z.infer<z.ZodObject<typeof geometryInputSchema>>;

/**
 * Registers the `geometry` tool on the MCP server.
 */
export function registerGeometryTool(server: McpServer, config: Configuration, logger: Logger = silentLogger): void {
    server.registerTool(
        'geometry',
        {
            title: 'Geometry',
            description: 'Polygon measures and transforms. Actions: area, centroid, bounding_box, transform, validate.',
            inputSchema: geometryInputSchema,
        },
        (args) => handleGeometry(args, config, logger),
    );
}

function handleGeometry(args: GeometryArgs, config: Configuration, logger: Logger) {
    const { vertices } = args;

    switch (args.action) {
        case 'area':
            return jsonResult({ area: polygonArea(vertices, logger) });
        case 'centroid':
            return jsonResult({ centroid: polygonCentroid(vertices, logger).toJSON() });
        case 'bounding_box':
            return jsonResult({ bounding_box: boundingBox(vertices) });
        case 'transform':
            return jsonResult({
                vertices: plainPoints(transformPolygon(vertices, {
                    translation: args.translation,
                    rotation: args.rotation,
                    scale: args.scale,
                })),
            });
        case 'validate': {
            const result = validatePolygon(vertices, config);
            if (!result.ok) {
                logger.warn('geometry validate: polygon rejected', { reason: result.error.message });
            }
            return jsonResult(result.ok ? { valid: true } : { valid: false, reason: result.error.message });
        }
        default:
            return errors.unknownAction('geometry', String(args.action));
    }
}
