/**
 * Tag and ingredient service.
 *
 * Both entities share the same shape (a user-owned name linked to recipes
 * through a join table), so every operation takes the kind and resolves the
 * table names from it.
 */

import { bindList, type Queryable } from '../../db.ts';
import type { AttributeKind, AttributeRef, ListAttributesOptions, RecipeAttribute } from './types.ts';

interface AttributeTables {
  table: string;
  link: string;
  fk: string;
}

const TABLES = {
  tag: { table: 'tag', link: 'recipe_tag', fk: 'tag_id' },
  ingredient: { table: 'ingredient', link: 'recipe_ingredient', fk: 'ingredient_id' },
} as const satisfies Record<AttributeKind, AttributeTables>;

/**
 * Lists a user's tags or ingredients, ordered by name descending.
 *
 * With `assigned_only`, only entities linked to at least one recipe are
 * returned; an entity linked to several recipes still appears once.
 */
export async function listAttributes(
  db: Queryable,
  kind: AttributeKind,
  userId: number,
  options: ListAttributesOptions = {},
): Promise<RecipeAttribute[]> {
  const { table, link, fk } = TABLES[kind];
  const assignedClause = options.assigned_only ? `AND EXISTS (SELECT 1 FROM ${link} l WHERE l.${fk} = a.id)` : '';

  const result = await db.query<RecipeAttribute>(
    `SELECT a.id, a.name
     FROM ${table} a
     WHERE a.user_id = $1 ${assignedClause}
     ORDER BY a.name DESC, a.id DESC`,
    [userId],
  );
  return result.rows.map((r) => ({ id: r.id, name: r.name }));
}

export async function getAttribute(db: Queryable, kind: AttributeKind, userId: number, id: number): Promise<RecipeAttribute | null> {
  const { table } = TABLES[kind];
  const result = await db.query<RecipeAttribute>(`SELECT id, name FROM ${table} WHERE id = $1 AND user_id = $2`, [id, userId]);
  return result.rows[0] ?? null;
}

/**
 * Renames a tag or ingredient owned by the user.
 *
 * @returns the updated entity, or null when it does not exist for this user.
 */
export async function renameAttribute(
  db: Queryable,
  kind: AttributeKind,
  userId: number,
  id: number,
  name: string,
): Promise<RecipeAttribute | null> {
  const { table } = TABLES[kind];
  const result = await db.query<RecipeAttribute>(
    `UPDATE ${table} SET name = $3 WHERE id = $1 AND user_id = $2 RETURNING id, name`,
    [id, userId, name],
  );
  return result.rows[0] ?? null;
}

/**
 * Deletes a tag or ingredient owned by the user. Recipe links go with it.
 *
 * @returns false when nothing matched.
 */
export async function deleteAttribute(db: Queryable, kind: AttributeKind, userId: number, id: number): Promise<boolean> {
  const { table } = TABLES[kind];
  const result = await db.query(`DELETE FROM ${table} WHERE id = $1 AND user_id = $2 RETURNING id`, [id, userId]);
  return result.rows.length > 0;
}

/**
 * Finds the user's tag/ingredient with this exact name, or creates it.
 * When several rows share the name (possible after renames) the oldest wins.
 */
export async function getOrCreateAttribute(db: Queryable, kind: AttributeKind, userId: number, name: string): Promise<RecipeAttribute> {
  const { table } = TABLES[kind];
  const existing = await db.query<RecipeAttribute>(
    `SELECT id, name FROM ${table} WHERE user_id = $1 AND name = $2 ORDER BY id LIMIT 1`,
    [userId, name],
  );
  if (existing.rows.length > 0) {
    return existing.rows[0];
  }

  const created = await db.query<RecipeAttribute>(
    `INSERT INTO ${table} (user_id, name) VALUES ($1, $2) RETURNING id, name`,
    [userId, name],
  );
  return created.rows[0];
}

/**
 * Replaces a recipe's tags or ingredients with exactly the named set,
 * resolving each name through {@link getOrCreateAttribute}. An empty list
 * clears every link.
 */
export async function replaceRecipeAttributes(
  db: Queryable,
  kind: AttributeKind,
  userId: number,
  recipeId: number,
  refs: AttributeRef[],
): Promise<void> {
  const { link, fk } = TABLES[kind];
  await db.query(`DELETE FROM ${link} WHERE recipe_id = $1`, [recipeId]);

  for (const ref of refs) {
    const attribute = await getOrCreateAttribute(db, kind, userId, ref.name);
    await db.query(
      `INSERT INTO ${link} (recipe_id, ${fk}) VALUES ($1, $2) ON CONFLICT DO NOTHING`,
      [recipeId, attribute.id],
    );
  }
}

/**
 * Loads the tags or ingredients linked to each of the given recipes,
 * ordered by id within a recipe.
 */
export async function loadRecipeAttributes(
  db: Queryable,
  kind: AttributeKind,
  recipeIds: number[],
): Promise<Map<number, RecipeAttribute[]>> {
  const byRecipe = new Map<number, RecipeAttribute[]>();
  if (recipeIds.length === 0) return byRecipe;

  const { table, link, fk } = TABLES[kind];
  const params: unknown[] = [];
  const result = await db.query<{ recipe_id: number; id: number; name: string }>(
    `SELECT l.recipe_id, a.id, a.name
     FROM ${link} l
     JOIN ${table} a ON a.id = l.${fk}
     WHERE l.recipe_id IN (${bindList(params, recipeIds)})
     ORDER BY a.id`,
    params,
  );

  for (const row of result.rows) {
    const list = byRecipe.get(row.recipe_id) ?? [];
    list.push({ id: row.id, name: row.name });
    byRecipe.set(row.recipe_id, list);
  }
  return byRecipe;
}
