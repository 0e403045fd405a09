/**
 * JSON Schemas for the component endpoints of an application under test,
 * compiled once with ajv.
 */

import _Ajv, { type JSONSchemaType, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

const ajv = new Ajv({ allErrors: true, strict: false });

/** `GET /api/components`: the ids of the registered components. */
export type ComponentList = string[];

/** `GET /api/components/<id>/metadata`: arbitrary key/value metadata. */
export type ComponentMetadata = Record<string, unknown>;

const COMPONENT_LIST_SCHEMA: JSONSchemaType<ComponentList> = {
  type: 'array',
  items: { type: 'string' },
};

const COMPONENT_METADATA_SCHEMA = {
  type: 'object',
  additionalProperties: true,
} as const;

export const validateComponentList = ajv.compile(COMPONENT_LIST_SCHEMA);
export const validateComponentMetadata = ajv.compile<ComponentMetadata>(COMPONENT_METADATA_SCHEMA);

/** Human-readable summary of the last validation errors of `validate`. */
export function schemaErrors<T>(validate: ValidateFunction<T>): string {
  return ajv.errorsText(validate.errors);
}
