import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Logger, silentLogger } from '../logger.js';
import { shapesSimilar, shapeOverlap, findOptimalAlignment, DEFAULT_ALIGNMENT_DENSITY } from '../algorithms/shape-compare.js';
import { verticesSchema, jsonResult } from './shared.js';
import * as errors from '../errors.js';

/** Upper bounds that keep a single call responsive. */
export const MAX_SAMPLE_DENSITY = 500;
export const MAX_ANGLE_STEPS = 360;

const DEFAULT_SIMILARITY_TOLERANCE = 1e-3;
const DEFAULT_OVERLAP_DENSITY = 100;
const DEFAULT_ANGLE_STEPS = 36;

/**
 * Zod input schema for the `compare` tool.
 */
const compareInputSchema = {
    action: z.enum(['similar', 'overlap', 'align']).describe('Shape comparison to run'),
    vertices: verticesSchema.describe('First polygon'),
    other_vertices: verticesSchema.describe('Second polygon'),
    tolerance: z.number().positive().optional().describe('Vertex distance tolerance after normalizing to unit area (similar)'),
    sample_density: z.number().int().positive().max(MAX_SAMPLE_DENSITY).optional().describe('Grid samples along the longer axis (overlap, align)'),
    angle_steps: z.number().int().positive().max(MAX_ANGLE_STEPS).optional().describe('Number of rotations to try (align)'),
};

type CompareArgs = z.infer<z.ZodObject<typeof compareInputSchema>>;

/**
 * Registers the `compare` tool on the MCP server.
 */
export function registerCompareTool(server: McpServer, logger: Logger = silentLogger): void {
    server.registerTool(
        'compare',
        {
            title: 'Compare Shapes',
            description: 'Shape similarity, sampled overlap and best-rotation search between two polygons. Actions: similar, overlap, align.',
            inputSchema: compareInputSchema,
        },
        (args) => handleCompare(args, logger),
    );
}

function handleCompare(args: CompareArgs, logger: Logger) {
    const { vertices, other_vertices } = args;

    switch (args.action) {
        case 'similar':
            return jsonResult({
                similar: shapesSimilar(vertices, other_vertices, args.tolerance ?? DEFAULT_SIMILARITY_TOLERANCE, logger),
            });
        case 'overlap':
            return jsonResult({
                overlap: shapeOverlap(vertices, other_vertices, args.sample_density ?? DEFAULT_OVERLAP_DENSITY),
            });
        case 'align': {
            const angle = findOptimalAlignment(
                vertices,
                other_vertices,
                args.angle_steps ?? DEFAULT_ANGLE_STEPS,
                args.sample_density ?? DEFAULT_ALIGNMENT_DENSITY,
            );
            return jsonResult({ angle, degrees: (angle * 180) / Math.PI });
        }
        default:
            return errors.unknownAction('compare', String(args.action));
    }
}
