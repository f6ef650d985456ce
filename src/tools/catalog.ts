import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Configuration } from '../config.js';
import { type Logger, silentLogger } from '../logger.js';
import { SHAPE_KINDS, shapeDisplayName } from '../types/shape-kind.js';
import {
    localVertices,
    shapeArea,
    vertexCount,
    frameSize,
    totalArea,
    validateCatalog,
    validateShape,
} from '../algorithms/shape-catalog.js';
import { jsonResult, plainPoints } from './shared.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `catalog` tool.
 */
const catalogInputSchema = {
    action: z.enum(['list', 'vertices', 'validate', 'total_area']).describe('Catalog query to run'),
    kind: z.enum(SHAPE_KINDS).optional().describe('Shape kind for vertices, or to validate a single shape'),
};

type CatalogArgs = z.infer<z.ZodObject<typeof catalogInputSchema>>;

/**
 * Registers the `catalog` tool on the MCP server.
 */
export function registerCatalogTool(server: McpServer, config: Configuration, logger: Logger = silentLogger): void {
    server.registerTool(
        'catalog',
        {
            title: 'Shape Catalog',
            description: 'The seven canonical tangram shapes at the configured unit. Actions: list, vertices, validate, total_area.',
            inputSchema: catalogInputSchema,
        },
        (args) => handleCatalog(args, config, logger),
    );
}

function handleCatalog(args: CatalogArgs, config: Configuration, logger: Logger) {
    const { unit } = config;

    switch (args.action) {
        case 'list':
            return jsonResult({
                unit,
                shapes: SHAPE_KINDS.map((kind) => ({
                    kind,
                    name: shapeDisplayName(kind),
                    vertex_count: vertexCount(kind),
                    area: shapeArea(kind, unit),
                    frame: frameSize(kind, unit),
                })),
            });
        case 'vertices':
            if (!args.kind) {
                return errors.missingArgument('catalog', 'vertices', 'kind');
            }
            return jsonResult({ kind: args.kind, vertices: plainPoints(localVertices(args.kind, unit)) });
        case 'validate': {
            const result = args.kind ? validateShape(args.kind, unit) : validateCatalog(unit);
            if (!result.ok) {
                logger.error('catalog validate: shape definitions are malformed', { reason: result.error.message });
                return jsonResult({ valid: false, reason: result.error.message });
            }
            return jsonResult({ valid: true });
        }
        case 'total_area':
            return jsonResult({ total_area: totalArea(unit) });
        default:
            return errors.unknownAction('catalog', String(args.action));
    }
}
