/**
 * Wire formats for recipes, tags and ingredients: zod schemas for what the
 * API accepts and mappers for what it returns.
 */

import { z } from 'zod';

import { ValidationError } from '../errors.ts';
import type { Recipe, RecipeAttribute } from './types.ts';

/** Upper bound of a Postgres `integer` column */
const PG_INT_MAX = 2_147_483_647;

const PRICE_PATTERN = /^\d{1,3}(\.\d{1,2})?$/;

/**
 * Price as a JSON number or decimal string; at most three integer and two
 * fractional digits (the column is numeric(5,2)). Normalized to a string.
 */
const priceSchema = z
  .union([z.number(), z.string().trim()])
  .transform((value) => (typeof value === 'number' ? String(value) : value))
  .refine((value) => PRICE_PATTERN.test(value), {
    message: 'Enter a non-negative amount with at most 3 digits before and 2 after the decimal point.',
  });

const attributeRefSchema = z.object({
  name: z.string().trim().min(1).max(255),
});

/** Body of POST /recipes; `user` and any other unknown key is dropped. */
export const createRecipeSchema = z.object({
  title: z.string().trim().min(1).max(255),
  time_minutes: z.number().int().nonnegative().max(PG_INT_MAX),
  price: priceSchema,
  description: z.string().optional(),
  link: z.string().max(255).optional(),
  tags: z.array(attributeRefSchema).optional(),
  ingredients: z.array(attributeRefSchema).optional(),
});

/** Body of PUT /recipes/:id — the same required fields as create */
export const replaceRecipeSchema = createRecipeSchema;

/** Body of PATCH /recipes/:id */
export const patchRecipeSchema = createRecipeSchema.partial();

/** Body of PUT /tags/:id and /ingredients/:id */
export const attributeSchema = z.object({
  name: z.string().trim().min(1).max(255),
});

/** Body of PATCH /tags/:id and /ingredients/:id */
export const patchAttributeSchema = attributeSchema.partial();

export type CreateRecipeBody = z.infer<typeof createRecipeSchema>;
export type PatchRecipeBody = z.infer<typeof patchRecipeSchema>;

/** List representation (GET /recipes) */
export interface RecipeSummary {
  id: number;
  title: string;
  time_minutes: number;
  price: string;
  link: string;
  tags: RecipeAttribute[];
  ingredients: RecipeAttribute[];
}

/** Detail representation (GET/POST/PUT/PATCH on a single recipe) */
export interface RecipeDetail extends RecipeSummary {
  description: string;
  /** Public URL of the uploaded image */
  image: string | null;
}

export function toRecipeSummary(recipe: Recipe): RecipeSummary {
  return {
    id: recipe.id,
    title: recipe.title,
    time_minutes: recipe.time_minutes,
    price: recipe.price,
    link: recipe.link,
    tags: recipe.tags,
    ingredients: recipe.ingredients,
  };
}

export function toRecipeDetail(recipe: Recipe, imageUrl: (key: string) => string): RecipeDetail {
  return {
    ...toRecipeSummary(recipe),
    description: recipe.description,
    image: recipe.image ? imageUrl(recipe.image) : null,
  };
}

const INTEGER_PATTERN = /^-?\d+$/;
const ID_PATTERN = /^\d{1,9}$/;

/**
 * Parses a comma-separated id list such as `"1,4, 7"`. Empty segments are
 * skipped; an empty or absent value means "no filter".
 *
 * @throws ValidationError naming `field` when a segment is not an integer.
 */
export function parseIdList(raw: string | undefined, field: string): number[] | undefined {
  if (raw === undefined) return undefined;
  const parts = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (parts.length === 0) return undefined;

  for (const part of parts) {
    if (!ID_PATTERN.test(part)) {
      throw ValidationError.field(field, `Enter a comma separated list of integer ids; got "${part}".`);
    }
  }
  return [...new Set(parts.map((p) => Number.parseInt(p, 10)))];
}

/**
 * Parses the `assigned_only` flag: any integer, non-zero meaning on.
 *
 * @throws ValidationError when the value is not an integer.
 */
export function parseAssignedOnly(raw: string | undefined): boolean {
  if (raw === undefined || raw.trim() === '') return false;
  if (!INTEGER_PATTERN.test(raw.trim())) {
    throw ValidationError.field('assigned_only', 'A valid integer is required.');
  }
  return Number.parseInt(raw.trim(), 10) !== 0;
}

/**
 * Parses a path id. Anything that is not a plausible row id cannot name an
 * existing resource, so callers answer 404 for `null`.
 */
export function parsePathId(raw: string): number | null {
  return ID_PATTERN.test(raw) ? Number.parseInt(raw, 10) : null;
}
