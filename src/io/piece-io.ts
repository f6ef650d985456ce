import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type PieceData, pieceLayoutSchema } from '../types/piece.js';
import { type Configuration } from '../config.js';
import { Piece } from '../classes/piece.js';
import * as errors from '../errors.js';

/**
 * A named set of pieces restored from disk.
 */
export interface PieceLayout {
  name: string;
  pieces: Piece[];
}

export function serializePiece(piece: Piece): PieceData {
  return piece.toJSON();
}

/**
 * Restores one piece. Throws `InvalidPieceData` for malformed input; unknown colors fall back.
 */
export function deserializePiece(data: unknown, config: Pick<Configuration, 'unit'>): Piece {
  return Piece.fromJSON(data, config);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads a piece layout from a JSON file.
 * Validates the structure: { name: string, pieces: PieceData[] }.
 *
 * @param filePath - Path to the layout JSON file
 * @param config - Supplies the unit the restored pieces are generated with
 */
export async function loadPieceLayoutFile(filePath: string, config: Pick<Configuration, 'unit'>): Promise<PieceLayout> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      throw new Error(errors.pieceLayoutFileNotFound(filePath));
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (e: unknown) {
    throw new Error(`Invalid JSON in piece layout file: ${filePath}. ${e instanceof Error ? e.message : ''}`);
  }

  const result = pieceLayoutSchema.safeParse(parsed);
  if (!result.success) {
    throw errors.invalidPieceData(errors.describeIssues(result.error));
  }

  return {
    name: result.data.name,
    pieces: result.data.pieces.map((data) => Piece.fromData(data, config)),
  };
}

/**
 * Saves a piece layout to a JSON file, creating the parent directory if needed.
 *
 * @param filePath - Path to the layout JSON file
 * @param name - The layout's display name
 * @param pieces - Pieces to store, in order
 */
export async function savePieceLayoutFile(filePath: string, name: string, pieces: readonly Piece[]): Promise<void> {
  const dataToSave = {
    name,
    pieces: pieces.map(serializePiece),
  };

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(dataToSave, null, 2), 'utf8');
}
