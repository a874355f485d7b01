/**
 * Recipe, tag and ingredient types.
 *
 * All property names use snake_case to match the database columns and the
 * wire format.
 */

/** The two per-user named entities a recipe links to */
export type AttributeKind = 'tag' | 'ingredient';

/** A tag or an ingredient. Names are scoped per user and may repeat across users. */
export interface RecipeAttribute {
  id: number;
  name: string;
}

export type Tag = RecipeAttribute;
export type Ingredient = RecipeAttribute;

/** A recipe as loaded from the database, with its links resolved */
export interface Recipe {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  /** numeric(5,2) rendered as text, e.g. "5.00" */
  price: string;
  description: string;
  link: string;
  /** Storage key of the uploaded image, if any */
  image: string | null;
  tags: Tag[];
  ingredients: Ingredient[];
}

/** Reference to a tag/ingredient by name inside a recipe write */
export interface AttributeRef {
  name: string;
}

/** Input for creating a recipe */
export interface CreateRecipeInput {
  title: string;
  time_minutes: number;
  price: string;
  description?: string;
  link?: string;
  tags?: AttributeRef[];
  ingredients?: AttributeRef[];
}

/** Input for updating a recipe; absent fields are left alone */
export interface UpdateRecipeInput {
  title?: string;
  time_minutes?: number;
  price?: string;
  description?: string;
  link?: string;
  tags?: AttributeRef[];
  ingredients?: AttributeRef[];
}

/** Query options for listing recipes */
export interface ListRecipesOptions {
  /** Keep recipes linked to any of these tag ids */
  tag_ids?: number[];
  /** Keep recipes linked to any of these ingredient ids */
  ingredient_ids?: number[];
}

/** Query options for listing tags or ingredients */
export interface ListAttributesOptions {
  /** Only entities linked to at least one recipe */
  assigned_only?: boolean;
}
