/**
 * Fastify routes for recipes, tags and ingredients.
 * Registers all /api/recipe/* endpoints.
 */

import type { FastifyInstance } from 'fastify';

import type { Database } from '../../db.ts';
import { currentUser } from '../auth/middleware.ts';
import { NotFoundError, ValidationError } from '../errors.ts';
import { detectImage, type FileStorage } from '../file-storage/index.ts';
import { deleteAttribute, getAttribute, listAttributes, renameAttribute } from './attributes.ts';
import {
  attributeSchema,
  createRecipeSchema,
  parseAssignedOnly,
  parseIdList,
  parsePathId,
  patchAttributeSchema,
  patchRecipeSchema,
  replaceRecipeSchema,
  toRecipeDetail,
  toRecipeSummary,
} from './serializers.ts';
import { createRecipe, deleteRecipe, getRecipe, listRecipes, setRecipeImage, updateRecipe } from './service.ts';
import type { AttributeKind } from './types.ts';

// ─── Types ───────────────────────────────────────────────────────────────────

interface IdParams {
  id: string;
}

interface RecipeListQuery {
  tags?: string;
  ingredients?: string;
}

interface AttributeListQuery {
  assigned_only?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const RECIPE_API_PREFIX = '/api/recipe';

const IMAGE_FIELD = 'image';

/** Where uploaded recipe images live inside the storage */
export function recipeImageKey(recipeId: number, ext: string): string {
  return `uploads/recipe/${recipeId}.${ext}`;
}

function requireId(raw: string, resource: string): number {
  const id = parsePathId(raw);
  if (id === null) throw new NotFoundError(resource);
  return id;
}

// ─── Plugin ──────────────────────────────────────────────────────────────────

export interface RecipeRoutesOptions {
  db: Database;
  storage: FileStorage;
}

/**
 * Fastify plugin that registers the recipe, tag and ingredient routes.
 *
 * Usage:
 * ```ts
 * app.register(recipeRoutesPlugin, { db, storage });
 * ```
 */
export async function recipeRoutesPlugin(app: FastifyInstance, opts: RecipeRoutesOptions): Promise<void> {
  const { db, storage } = opts;
  const imageUrl = (key: string): string => storage.publicUrl(key);

  // ============================================================
  // Recipes
  // ============================================================

  // GET /api/recipe/recipes — list, optionally filtered by tag/ingredient ids
  app.get<{ Querystring: RecipeListQuery }>(`${RECIPE_API_PREFIX}/recipes`, async (req) => {
    const user = currentUser(req);
    const recipes = await listRecipes(db, user.id, {
      tag_ids: parseIdList(req.query.tags, 'tags'),
      ingredient_ids: parseIdList(req.query.ingredients, 'ingredients'),
    });
    return recipes.map(toRecipeSummary);
  });

  // POST /api/recipe/recipes — create; owner is always the caller
  app.post(`${RECIPE_API_PREFIX}/recipes`, async (req, reply) => {
    const user = currentUser(req);
    const body = createRecipeSchema.parse(req.body ?? {});
    const recipe = await createRecipe(db, user.id, body);
    req.log.info({ recipe_id: recipe.id, user_id: user.id }, 'Recipe created');
    return reply.code(201).send(toRecipeDetail(recipe, imageUrl));
  });

  app.get<{ Params: IdParams }>(`${RECIPE_API_PREFIX}/recipes/:id`, async (req) => {
    const user = currentUser(req);
    const recipe = await getRecipe(db, user.id, requireId(req.params.id, 'Recipe'));
    if (!recipe) throw new NotFoundError('Recipe');
    return toRecipeDetail(recipe, imageUrl);
  });

  // PUT replaces every writable scalar field; omitted optional text fields reset to ''
  app.put<{ Params: IdParams }>(`${RECIPE_API_PREFIX}/recipes/:id`, async (req) => {
    const user = currentUser(req);
    const id = requireId(req.params.id, 'Recipe');
    const body = replaceRecipeSchema.parse(req.body ?? {});
    const recipe = await updateRecipe(db, user.id, id, {
      ...body,
      description: body.description ?? '',
      link: body.link ?? '',
    });
    if (!recipe) throw new NotFoundError('Recipe');
    return toRecipeDetail(recipe, imageUrl);
  });

  app.patch<{ Params: IdParams }>(`${RECIPE_API_PREFIX}/recipes/:id`, async (req) => {
    const user = currentUser(req);
    const id = requireId(req.params.id, 'Recipe');
    const body = patchRecipeSchema.parse(req.body ?? {});
    const recipe = await updateRecipe(db, user.id, id, body);
    if (!recipe) throw new NotFoundError('Recipe');
    return toRecipeDetail(recipe, imageUrl);
  });

  app.delete<{ Params: IdParams }>(`${RECIPE_API_PREFIX}/recipes/:id`, async (req, reply) => {
    const user = currentUser(req);
    const deleted = await deleteRecipe(db, user.id, requireId(req.params.id, 'Recipe'));
    if (!deleted) throw new NotFoundError('Recipe');
    // The row is gone either way; a stray file is only logged
    if (deleted.image) {
      try {
        await storage.delete(deleted.image);
      } catch (err) {
        req.log.error({ err, key: deleted.image }, 'Failed to delete recipe image');
      }
    }
    return reply.code(204).send();
  });

  // POST /api/recipe/recipes/:id/upload-image — multipart, single `image` file
  app.post<{ Params: IdParams }>(`${RECIPE_API_PREFIX}/recipes/:id/upload-image`, async (req) => {
    const user = currentUser(req);
    const id = requireId(req.params.id, 'Recipe');
    if (!(await getRecipe(db, user.id, id))) throw new NotFoundError('Recipe');

    if (!req.isMultipart()) {
      throw ValidationError.field(IMAGE_FIELD, 'The submitted data was not a file. Check the encoding type on the form.');
    }
    const file = await req.file();
    if (!file || file.fieldname !== IMAGE_FIELD) {
      file?.file.resume();
      throw ValidationError.field(IMAGE_FIELD, 'No file was submitted.');
    }

    const data = await file.toBuffer();
    const detected = await detectImage(data);
    if (!detected) {
      throw ValidationError.field(
        IMAGE_FIELD,
        'Upload a valid image. The file you uploaded was either not an image or a corrupted image.',
      );
    }

    const key = recipeImageKey(id, detected.ext);
    await storage.upload(key, data, detected.mime);
    const result = await setRecipeImage(db, user.id, id, key);
    if (!result) {
      // Deleted between the lookup and the write
      await storage.delete(key);
      throw new NotFoundError('Recipe');
    }
    if (result.previous && result.previous !== key) {
      await storage.delete(result.previous);
    }

    req.log.info({ recipe_id: id, key, mime: detected.mime, size_bytes: data.length }, 'Recipe image stored');
    return { id, image: imageUrl(key) };
  });

  // ============================================================
  // Tags & ingredients
  // ============================================================

  registerAttributeRoutes(app, db, 'tag', `${RECIPE_API_PREFIX}/tags`);
  registerAttributeRoutes(app, db, 'ingredient', `${RECIPE_API_PREFIX}/ingredients`);
}

/**
 * List/update/delete routes shared by tags and ingredients. There is no
 * create route: both are created through recipe writes.
 */
function registerAttributeRoutes(app: FastifyInstance, db: Database, kind: AttributeKind, basePath: string): void {
  const resource = kind === 'tag' ? 'Tag' : 'Ingredient';

  app.get<{ Querystring: AttributeListQuery }>(basePath, async (req) => {
    const user = currentUser(req);
    return listAttributes(db, kind, user.id, { assigned_only: parseAssignedOnly(req.query.assigned_only) });
  });

  app.put<{ Params: IdParams }>(`${basePath}/:id`, async (req) => {
    const user = currentUser(req);
    const id = requireId(req.params.id, resource);
    const body = attributeSchema.parse(req.body ?? {});
    const updated = await renameAttribute(db, kind, user.id, id, body.name);
    if (!updated) throw new NotFoundError(resource);
    return updated;
  });

  app.patch<{ Params: IdParams }>(`${basePath}/:id`, async (req) => {
    const user = currentUser(req);
    const id = requireId(req.params.id, resource);
    const body = patchAttributeSchema.parse(req.body ?? {});
    // An empty patch is a no-op that still reports the current state
    const updated =
      body.name === undefined
        ? await getAttribute(db, kind, user.id, id)
        : await renameAttribute(db, kind, user.id, id, body.name);
    if (!updated) throw new NotFoundError(resource);
    return updated;
  });

  app.delete<{ Params: IdParams }>(`${basePath}/:id`, async (req, reply) => {
    const user = currentUser(req);
    const deleted = await deleteAttribute(db, kind, user.id, requireId(req.params.id, resource));
    if (!deleted) throw new NotFoundError(resource);
    return reply.code(204).send();
  });
}
