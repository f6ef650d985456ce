export { type Point } from './types/vertex.js';
export { type Rect, type Size, rectMaxX, rectMaxY } from './types/rect.js';
export { ShapeKind, SHAPE_KINDS, shapeDisplayName, isShapeKind, parseShapeKind } from './types/shape-kind.js';
export {
  type PieceColor,
  PIECE_COLORS,
  FALLBACK_PIECE_COLOR,
  isPieceColor,
  decodePieceColor,
} from './types/piece-color.js';
export {
  type PieceData,
  type PieceLayoutData,
  pieceDataSchema,
  pieceLayoutSchema,
} from './types/piece.js';

export { Vertex, ORIGIN } from './classes/vertex.js';
export { VertexSet } from './classes/vertex-set.js';
export { Piece, type PieceInit, SNAP_EPSILON } from './classes/piece.js';

export {
  localVertices,
  shapeArea,
  vertexCount,
  frameSize,
  totalArea,
  validateShape,
  validateCatalog,
  CANONICAL_SET_AREA,
  MIN_SHAPE_AREA,
  MAX_SHAPE_AREA,
} from './algorithms/shape-catalog.js';
export {
  polygonArea,
  polygonCentroid,
  vertexAverage,
  boundingBox,
  translateAll,
  rotateAll,
  scaleAll,
  transformPolygon,
  validatePolygon,
  type PolygonTransform,
  DEGENERATE_AREA,
  MIN_POLYGON_AREA,
} from './algorithms/polygon.js';
export {
  pointInPolygon,
  segmentDistance,
  boxesIntersect,
  circleIntersectsPolygon,
  piecesNearPoint,
  sharedVertices,
} from './algorithms/collision.js';
export {
  shapesSimilar,
  shapeOverlap,
  findOptimalAlignment,
  MIN_GRID_SAMPLES,
  DEFAULT_ALIGNMENT_DENSITY,
} from './algorithms/shape-compare.js';

export {
  type PieceLayout,
  serializePiece,
  deserializePiece,
  loadPieceLayoutFile,
  savePieceLayoutFile,
} from './io/piece-io.js';

export {
  type Configuration,
  DEFAULT_CONFIGURATION,
  CONFIGURATION_ENV,
  configurationSchema,
  createConfiguration,
  loadConfiguration,
} from './config.js';
export {
  type Logger,
  type LogLevel,
  type LogContext,
  silentLogger,
  createConsoleLogger,
  parseLogLevel,
} from './logger.js';
export { GeometryError, type GeometryErrorKind, type ValidationResult } from './errors.js';
export { createServer } from './server.js';
