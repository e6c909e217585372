/**
 * OpenAPI document model used by the merge
 *
 * Why simplified: The merge only cares about containers and keys. Component
 * bodies stay opaque and are typed through openapi-types. Every top-level
 * field is optional because partial specs (mixins) rarely carry all of them.
 */

import type { OpenAPIV3 } from 'openapi-types';

export type ExtensionKey = `x-${string}`;

/**
 * Vendor extensions live inline on the object they extend
 */
export type Extensions = { [key: ExtensionKey]: unknown };

export interface ContactObject extends Extensions {
  name?: string;
  url?: string;
  email?: string;
}

export interface LicenseObject extends Extensions {
  name?: string;
  url?: string;
}

export interface InfoObject extends Extensions {
  title?: string;
  description?: string;
  termsOfService?: string;
  version?: string;
  contact?: ContactObject;
  license?: LicenseObject;
}

export interface ExternalDocsObject {
  url?: string;
  description?: string;
}

export interface TagObject extends Extensions {
  name: string;
  description?: string;
  externalDocs?: ExternalDocsObject;
}

/** Scheme name -> required scopes */
export type SecurityRequirement = Record<string, string[]>;

export type OperationObject = OpenAPIV3.OperationObject;

export type ResponseObject = OpenAPIV3.ResponseObject;

export interface PathItemObject extends Extensions {
  $ref?: string;
  summary?: string;
  description?: string;
  servers?: OpenAPIV3.ServerObject[];
  parameters?: Array<OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject>;
  get?: OperationObject;
  put?: OperationObject;
  post?: OperationObject;
  delete?: OperationObject;
  options?: OperationObject;
  head?: OperationObject;
  patch?: OperationObject;
  trace?: OperationObject;
}

export type PathsObject = Record<string, PathItemObject>;

export type SchemaEntry = OpenAPIV3.ReferenceObject | OpenAPIV3.SchemaObject;
export type ParameterEntry = OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject;
export type ResponseEntry = OpenAPIV3.ReferenceObject | ResponseObject;
export type SecuritySchemeEntry = OpenAPIV3.ReferenceObject | OpenAPIV3.SecuritySchemeObject;

export interface ComponentsObject {
  schemas?: Record<string, SchemaEntry>;
  parameters?: Record<string, ParameterEntry>;
  responses?: Record<string, ResponseEntry>;
  securitySchemes?: Record<string, SecuritySchemeEntry>;
  examples?: Record<string, OpenAPIV3.ReferenceObject | OpenAPIV3.ExampleObject>;
  requestBodies?: Record<string, OpenAPIV3.ReferenceObject | OpenAPIV3.RequestBodyObject>;
  headers?: Record<string, OpenAPIV3.ReferenceObject | OpenAPIV3.HeaderObject>;
}

export interface OpenAPIDocument extends Extensions {
  openapi?: string;
  info?: InfoObject;
  externalDocs?: ExternalDocsObject;
  servers?: OpenAPIV3.ServerObject[];
  tags?: TagObject[];
  security?: SecurityRequirement[];
  paths?: PathsObject;
  components?: ComponentsObject;
}

/**
 * The four component collections the merge folds together
 */
export type MergedComponentKey = 'schemas' | 'parameters' | 'responses' | 'securitySchemes';
