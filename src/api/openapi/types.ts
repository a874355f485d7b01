/**
 * The subset of OpenAPI 3.0.3 the recipe API documents itself with.
 */

export interface SchemaObject {
  type?: string;
  format?: string;
  enum?: readonly string[];
  properties?: Record<string, SchemaObject>;
  required?: readonly string[];
  items?: SchemaObject;
  /** Map-shaped objects, e.g. field name to messages */
  additionalProperties?: SchemaObject;
  allOf?: readonly SchemaObject[];
  $ref?: string;
  nullable?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  description?: string;
  example?: unknown;
  default?: unknown;
  minimum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
}

/** Path ids and list filters; there are no header or cookie parameters */
export interface ParameterObject {
  name: string;
  in: 'path' | 'query';
  required?: boolean;
  description?: string;
  schema: SchemaObject;
  example?: unknown;
}

export interface MediaTypeObject {
  schema: SchemaObject;
}

export interface RequestBodyObject {
  required?: boolean;
  content: Record<string, MediaTypeObject>;
}

export interface ResponseObject {
  description: string;
  content?: Record<string, MediaTypeObject>;
}

export interface OperationObject {
  operationId: string;
  summary: string;
  description?: string;
  tags: readonly string[];
  /** `[]` marks a route that needs no bearer token */
  security?: ReadonlyArray<Record<string, readonly string[]>>;
  parameters?: readonly ParameterObject[];
  requestBody?: RequestBodyObject;
  responses: Record<string, ResponseObject>;
}

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export type PathItemObject = Partial<Record<HttpMethod, OperationObject>> & {
  parameters?: readonly ParameterObject[];
};

/** One resource group (health, users, recipes) contributing to the document */
export interface OpenApiDomainModule {
  paths: Record<string, PathItemObject>;
  schemas?: Record<string, SchemaObject>;
  tags?: ReadonlyArray<{ name: string; description: string }>;
}
