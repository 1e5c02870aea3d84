import {
  type JsonValue,
  type SchemaDocument,
  type SourceRecord,
  type TypeDescriptor,
  tagValue
} from '../types';

export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Static schema used when a stream yields no records to sample
 */
export const FALLBACK_SCHEMA: SchemaDocument = {
  $schema: JSON_SCHEMA_DRAFT,
  type: 'object',
  properties: {
    _id: { type: ['null', 'string'] },
    updatedAt: { type: ['null', 'string'] },
    createdAt: { type: ['null', 'string'] }
  },
  additionalProperties: true
};

export function isIsoDateTime(value: string): boolean {
  return ISO_DATE_TIME.test(value);
}

/**
 * Map one observed value to a nullable type descriptor
 */
export function inferType(value: JsonValue | undefined): TypeDescriptor {
  const tagged = tagValue(value);

  switch (tagged.kind) {
    case 'null':
      return { type: 'null' };
    case 'boolean':
      return { type: ['null', 'boolean'] };
    case 'integer':
      return { type: ['null', 'integer'] };
    case 'number':
      return { type: ['null', 'number'] };
    case 'string':
      return isIsoDateTime(tagged.value)
        ? { type: ['null', 'string'], format: 'date-time' }
        : { type: ['null', 'string'] };
    case 'array':
      // heterogeneous arrays are common; leave items open
      return { type: ['null', 'array'], items: {} };
    case 'object':
      return { type: ['null', 'object'], additionalProperties: true };
  }
}

/**
 * Build a schema document from sample records. The first record decides each
 * field's descriptor; later records only add fields it lacks. With no sample
 * the fallback schema is returned.
 */
export function inferSchema(
  records: readonly SourceRecord[],
  fallback: SchemaDocument = FALLBACK_SCHEMA
): SchemaDocument {
  if (records.length === 0) {
    return fallback;
  }

  const properties: Record<string, TypeDescriptor> = {};

  for (const record of records) {
    for (const [field, value] of Object.entries(record)) {
      if (!(field in properties)) {
        properties[field] = inferType(value);
      }
    }
  }

  return {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties,
    additionalProperties: true
  };
}
