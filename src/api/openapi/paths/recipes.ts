/**
 * OpenAPI path definitions for recipes, tags and ingredients.
 * Routes: GET/POST /api/recipe/recipes, GET/PUT/PATCH/DELETE /api/recipe/recipes/:id,
 *         POST /api/recipe/recipes/:id/upload-image,
 *         GET /api/recipe/{tags,ingredients}, PUT/PATCH/DELETE /api/recipe/{tags,ingredients}/:id
 */
import type { OpenApiDomainModule, ParameterObject, PathItemObject } from '../types.ts';
import { arrayOf, errorResponses, idParam, jsonBody, jsonResponse, ref } from '../helpers.ts';

function idListParam(name: string, what: string): ParameterObject {
  return {
    name,
    in: 'query',
    description: `Comma separated ${what} ids; recipes linked to any of them are returned`,
    schema: { type: 'string', pattern: '^\\d+(,\\d+)*$' },
    example: '1,3',
  };
}

/** List, update and delete operations shared by tags and ingredients */
function attributePaths(plural: string, tag: string, singular: string): Record<string, PathItemObject> {
  const base = `/api/recipe/${plural}`;
  return {
    [base]: {
      get: {
        operationId: `list${tag}`,
        summary: `List the caller's ${plural}, by name descending`,
        tags: [tag],
        parameters: [
          {
            name: 'assigned_only',
            in: 'query',
            description: `1 to return only ${plural} linked to at least one recipe`,
            schema: { type: 'integer', default: 0 },
          },
        ],
        responses: {
          '200': jsonResponse(`${tag}`, arrayOf(ref('RecipeAttribute'))),
          ...errorResponses(400, 401),
        },
      },
    },
    [`${base}/{id}`]: {
      parameters: [idParam('id', `${singular} id`)],
      put: {
        operationId: `replace${singular}`,
        summary: `Rename a ${singular.toLowerCase()}`,
        tags: [tag],
        requestBody: jsonBody(ref('RecipeAttributeInput')),
        responses: {
          '200': jsonResponse(`Updated ${singular.toLowerCase()}`, ref('RecipeAttribute')),
          ...errorResponses(400, 401, 404),
        },
      },
      patch: {
        operationId: `update${singular}`,
        summary: `Partially update a ${singular.toLowerCase()}`,
        tags: [tag],
        requestBody: jsonBody(ref('RecipeAttributeInput'), false),
        responses: {
          '200': jsonResponse(`Updated ${singular.toLowerCase()}`, ref('RecipeAttribute')),
          ...errorResponses(400, 401, 404),
        },
      },
      delete: {
        operationId: `delete${singular}`,
        summary: `Delete a ${singular.toLowerCase()}; linked recipes are kept`,
        tags: [tag],
        responses: {
          '204': { description: 'Deleted' },
          ...errorResponses(401, 404),
        },
      },
    },
  };
}

export function recipesPaths(): OpenApiDomainModule {
  return {
    tags: [
      { name: 'Recipes', description: 'Recipes owned by the authenticated user' },
      { name: 'Tags', description: 'Per-user tags, created through recipe writes' },
      { name: 'Ingredients', description: 'Per-user ingredients, created through recipe writes' },
    ],
    schemas: {
      RecipeAttribute: {
        type: 'object',
        required: ['id', 'name'],
        properties: {
          id: { type: 'integer', readOnly: true, example: 1 },
          name: { type: 'string', example: 'Vegan' },
        },
      },
      RecipeAttributeInput: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', minLength: 1, maxLength: 255, example: 'Dessert' },
        },
      },
      RecipeSummary: {
        type: 'object',
        required: ['id', 'title', 'time_minutes', 'price', 'link', 'tags', 'ingredients'],
        properties: {
          id: { type: 'integer', readOnly: true, example: 1 },
          title: { type: 'string', maxLength: 255, example: 'Thai Prawn Curry' },
          time_minutes: { type: 'integer', minimum: 0, example: 30 },
          price: { type: 'string', description: 'Decimal with two places', example: '7.50' },
          link: { type: 'string', example: 'https://example.com/curry' },
          tags: arrayOf(ref('RecipeAttribute')),
          ingredients: arrayOf(ref('RecipeAttribute')),
        },
      },
      RecipeDetail: {
        allOf: [
          ref('RecipeSummary'),
          {
            type: 'object',
            required: ['description', 'image'],
            properties: {
              description: { type: 'string' },
              image: { type: 'string', nullable: true, description: 'Public URL of the uploaded image' },
            },
          },
        ],
      },
      RecipeInput: {
        type: 'object',
        required: ['title', 'time_minutes', 'price'],
        properties: {
          title: { type: 'string', minLength: 1, maxLength: 255 },
          time_minutes: { type: 'integer', minimum: 0 },
          price: { type: 'string', pattern: '^\\d{1,3}(\\.\\d{1,2})?$', description: 'A JSON number is also accepted' },
          description: { type: 'string' },
          link: { type: 'string', maxLength: 255 },
          tags: { ...arrayOf(ref('RecipeAttributeInput')), description: 'Replaces every tag; names are reused or created' },
          ingredients: { ...arrayOf(ref('RecipeAttributeInput')), description: 'Replaces every ingredient' },
        },
      },
      RecipeImage: {
        type: 'object',
        required: ['id', 'image'],
        properties: {
          id: { type: 'integer' },
          image: { type: 'string', example: 'http://localhost:3000/static/media/uploads/recipe/1.png' },
        },
      },
    },
    paths: {
      '/api/recipe/recipes': {
        get: {
          operationId: 'listRecipes',
          summary: "List the caller's recipes, newest first",
          tags: ['Recipes'],
          parameters: [idListParam('tags', 'tag'), idListParam('ingredients', 'ingredient')],
          responses: {
            '200': jsonResponse('Recipes', arrayOf(ref('RecipeSummary'))),
            ...errorResponses(400, 401),
          },
        },
        post: {
          operationId: 'createRecipe',
          summary: 'Create a recipe owned by the caller',
          tags: ['Recipes'],
          requestBody: jsonBody(ref('RecipeInput')),
          responses: {
            '201': jsonResponse('Created recipe', ref('RecipeDetail')),
            ...errorResponses(400, 401),
          },
        },
      },
      '/api/recipe/recipes/{id}': {
        parameters: [idParam('id', 'Recipe id')],
        get: {
          operationId: 'getRecipe',
          summary: 'Get a recipe',
          tags: ['Recipes'],
          responses: {
            '200': jsonResponse('Recipe', ref('RecipeDetail')),
            ...errorResponses(401, 404),
          },
        },
        put: {
          operationId: 'replaceRecipe',
          summary: 'Replace a recipe',
          description: 'Omitted description and link are reset to empty; tags and ingredients change only when present.',
          tags: ['Recipes'],
          requestBody: jsonBody(ref('RecipeInput')),
          responses: {
            '200': jsonResponse('Updated recipe', ref('RecipeDetail')),
            ...errorResponses(400, 401, 404),
          },
        },
        patch: {
          operationId: 'updateRecipe',
          summary: 'Partially update a recipe',
          tags: ['Recipes'],
          requestBody: jsonBody(ref('RecipeInput'), false),
          responses: {
            '200': jsonResponse('Updated recipe', ref('RecipeDetail')),
            ...errorResponses(400, 401, 404),
          },
        },
        delete: {
          operationId: 'deleteRecipe',
          summary: 'Delete a recipe and its image',
          tags: ['Recipes'],
          responses: {
            '204': { description: 'Deleted' },
            ...errorResponses(401, 404),
          },
        },
      },
      '/api/recipe/recipes/{id}/upload-image': {
        parameters: [idParam('id', 'Recipe id')],
        post: {
          operationId: 'uploadRecipeImage',
          summary: 'Attach an image to a recipe',
          tags: ['Recipes'],
          requestBody: {
            required: true,
            content: {
              'multipart/form-data': {
                schema: {
                  type: 'object',
                  required: ['image'],
                  properties: { image: { type: 'string', format: 'binary' } },
                },
              },
            },
          },
          responses: {
            '200': jsonResponse('Image stored', ref('RecipeImage')),
            ...errorResponses(400, 401, 404, 413),
          },
        },
      },
      ...attributePaths('tags', 'Tags', 'Tag'),
      ...attributePaths('ingredients', 'Ingredients', 'Ingredient'),
    },
  };
}
