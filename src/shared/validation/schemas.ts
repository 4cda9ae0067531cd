import { z } from 'zod';
import { PIECE_COUNT, PLAYER_COLORS, SHAPE_SIZE } from '../types/game';

// Anchor validation. Anchors are signed: a host may report a cursor that sits
// off the play area, which recentering then rejects as out of bounds.
export const PositionSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export type PositionInput = z.infer<typeof PositionSchema>;

export const PlayerColorSchema = z.enum(['blue', 'yellow', 'red', 'green']);

// Seating order: 2 to 4 distinct colours.
export const PlayerOrderSchema = z
  .array(PlayerColorSchema)
  .min(2)
  .max(PLAYER_COLORS.length)
  .refine((colors) => new Set(colors).size === colors.length, {
    message: 'Player colours must be distinct',
  });

export const ShapeTransformSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('rotate'), direction: z.enum(['right', 'left']) }),
  z.object({ kind: z.literal('flip'), axis: z.enum(['horizontal', 'vertical']) }),
]);

const ShapeRowSchema = z.string().regex(new RegExp(`^[01]{${SHAPE_SIZE}}$`), {
  message: `Shape rows must be ${SHAPE_SIZE} characters of 0/1`,
});

export const PieceDefinitionSchema = z
  .object({
    id: z.number().int().min(0).max(PIECE_COUNT - 1),
    name: z.string().min(1),
    rows: z.array(ShapeRowSchema).length(SHAPE_SIZE),
  })
  .refine(
    (piece) => {
      const filled = piece.rows.join('').split('').filter((c) => c === '1').length;
      return filled >= 1 && filled <= 5;
    },
    { message: 'A piece covers between 1 and 5 squares' }
  );

// NOTE: Ids double as array indices throughout the engine, so the catalog
// must list them densely and in order.
export const PieceCatalogSchema = z
  .object({
    pieces: z.array(PieceDefinitionSchema).length(PIECE_COUNT),
  })
  .refine((catalog) => catalog.pieces.every((piece, index) => piece.id === index), {
    message: 'Catalog ids must run 0..20 in order',
  });

export type PieceDefinitionInput = z.infer<typeof PieceDefinitionSchema>;
export type PieceCatalogInput = z.infer<typeof PieceCatalogSchema>;
