/**
 * Recipe service for the recipes API.
 *
 * Every query is scoped to the requesting user: a recipe owned by someone
 * else behaves exactly like one that does not exist.
 */

import { bindList, withTransaction, type Database, type Queryable } from '../../db.ts';
import { loadRecipeAttributes, replaceRecipeAttributes } from './attributes.ts';
import type { CreateRecipeInput, ListRecipesOptions, Recipe, UpdateRecipeInput } from './types.ts';

interface RecipeRow {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  price: string;
  description: string;
  link: string;
  image: string | null;
}

const RECIPE_COLUMNS = 'r.id, r.user_id, r.title, r.time_minutes, r.price::text AS price, r.description, r.link, r.image';

/** Scalar columns a write may touch, in a fixed order */
const WRITABLE_COLUMNS = ['title', 'time_minutes', 'price', 'description', 'link'] as const;

/**
 * Attach tags and ingredients to recipe rows, preserving row order.
 */
async function hydrate(db: Queryable, rows: RecipeRow[]): Promise<Recipe[]> {
  const ids = rows.map((r) => r.id);
  const [tags, ingredients] = await Promise.all([
    loadRecipeAttributes(db, 'tag', ids),
    loadRecipeAttributes(db, 'ingredient', ids),
  ]);

  return rows.map((row) => ({
    id: row.id,
    user_id: row.user_id,
    title: row.title,
    time_minutes: row.time_minutes,
    price: row.price,
    description: row.description,
    link: row.link,
    image: row.image,
    tags: tags.get(row.id) ?? [],
    ingredients: ingredients.get(row.id) ?? [],
  }));
}

async function fetchRecipe(db: Queryable, userId: number, id: number): Promise<Recipe | null> {
  const result = await db.query<RecipeRow>(`SELECT ${RECIPE_COLUMNS} FROM recipe r WHERE r.id = $1 AND r.user_id = $2`, [id, userId]);
  if (result.rows.length === 0) return null;
  const [recipe] = await hydrate(db, result.rows);
  return recipe;
}

/**
 * Lists the user's recipes, newest (highest id) first.
 *
 * `tag_ids` and `ingredient_ids` each keep recipes linked to any of the given
 * ids; when both are present a recipe must satisfy both. A recipe matching
 * several ids is still returned once.
 */
export async function listRecipes(db: Queryable, userId: number, options: ListRecipesOptions = {}): Promise<Recipe[]> {
  const conditions = ['r.user_id = $1'];
  const params: unknown[] = [userId];

  if (options.tag_ids && options.tag_ids.length > 0) {
    conditions.push(`r.id IN (SELECT recipe_id FROM recipe_tag WHERE tag_id IN (${bindList(params, options.tag_ids)}))`);
  }
  if (options.ingredient_ids && options.ingredient_ids.length > 0) {
    conditions.push(
      `r.id IN (SELECT recipe_id FROM recipe_ingredient WHERE ingredient_id IN (${bindList(params, options.ingredient_ids)}))`,
    );
  }

  const result = await db.query<RecipeRow>(
    `SELECT ${RECIPE_COLUMNS}
     FROM recipe r
     WHERE ${conditions.join(' AND ')}
     ORDER BY r.id DESC`,
    params,
  );
  return hydrate(db, result.rows);
}

export async function getRecipe(db: Queryable, userId: number, id: number): Promise<Recipe | null> {
  return fetchRecipe(db, userId, id);
}

/**
 * Creates a recipe owned by `userId`, resolving named tags and ingredients
 * to the user's existing rows or new ones, in a single transaction.
 */
export async function createRecipe(db: Database, userId: number, input: CreateRecipeInput): Promise<Recipe> {
  return withTransaction(db, async (client) => {
    const result = await client.query<{ id: number }>(
      `INSERT INTO recipe (user_id, title, time_minutes, price, description, link)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id`,
      [userId, input.title, input.time_minutes, input.price, input.description ?? '', input.link ?? ''],
    );
    const recipeId = result.rows[0].id;

    if (input.tags) {
      await replaceRecipeAttributes(client, 'tag', userId, recipeId, input.tags);
    }
    if (input.ingredients) {
      await replaceRecipeAttributes(client, 'ingredient', userId, recipeId, input.ingredients);
    }

    const recipe = await fetchRecipe(client, userId, recipeId);
    if (!recipe) {
      throw new Error(`Recipe ${recipeId} not readable after insert`);
    }
    return recipe;
  });
}

/**
 * Applies an update to one of the user's recipes. Only fields present in
 * `input` change; `tags`/`ingredients`, when present, replace the whole set.
 * The owner never changes.
 *
 * @returns the updated recipe, or null when the user has no such recipe.
 */
export async function updateRecipe(db: Database, userId: number, id: number, input: UpdateRecipeInput): Promise<Recipe | null> {
  return withTransaction(db, async (client) => {
    const owned = await client.query('SELECT id FROM recipe WHERE id = $1 AND user_id = $2 FOR UPDATE', [id, userId]);
    if (owned.rows.length === 0) return null;

    const sets: string[] = [];
    const params: unknown[] = [];
    for (const column of WRITABLE_COLUMNS) {
      const value = input[column];
      if (value === undefined) continue;
      params.push(value);
      sets.push(`${column} = $${params.length}`);
    }

    params.push(id);
    await client.query(`UPDATE recipe SET ${[...sets, 'updated_at = now()'].join(', ')} WHERE id = $${params.length}`, params);

    if (input.tags) {
      await replaceRecipeAttributes(client, 'tag', userId, id, input.tags);
    }
    if (input.ingredients) {
      await replaceRecipeAttributes(client, 'ingredient', userId, id, input.ingredients);
    }

    return fetchRecipe(client, userId, id);
  });
}

/**
 * Deletes one of the user's recipes. Linked tags and ingredients survive.
 *
 * @returns the deleted recipe's image key (so the caller can drop the file),
 * `undefined` when nothing matched.
 */
export async function deleteRecipe(db: Queryable, userId: number, id: number): Promise<{ image: string | null } | undefined> {
  const result = await db.query<{ image: string | null }>('DELETE FROM recipe WHERE id = $1 AND user_id = $2 RETURNING image', [id, userId]);
  return result.rows[0];
}

/**
 * Points the recipe at a newly stored image.
 *
 * @returns the previous image key (null if there was none), or `undefined`
 * when the user has no such recipe.
 */
export async function setRecipeImage(
  db: Database,
  userId: number,
  id: number,
  image: string,
): Promise<{ previous: string | null } | undefined> {
  return withTransaction(db, async (client) => {
    const current = await client.query<{ image: string | null }>(
      'SELECT image FROM recipe WHERE id = $1 AND user_id = $2 FOR UPDATE',
      [id, userId],
    );
    if (current.rows.length === 0) return undefined;

    await client.query('UPDATE recipe SET image = $1, updated_at = now() WHERE id = $2', [image, id]);
    return { previous: current.rows[0].image };
  });
}
