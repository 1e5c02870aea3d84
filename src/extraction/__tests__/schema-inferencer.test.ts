import { FALLBACK_SCHEMA, inferSchema, inferType, isIsoDateTime, JSON_SCHEMA_DRAFT } from '../schema-inferencer';

describe('schema inferencer', () => {
  describe('inferType', () => {
    it('should map each JSON kind to a nullable descriptor', () => {
      expect(inferType(true)).toEqual({ type: ['null', 'boolean'] });
      expect(inferType(42)).toEqual({ type: ['null', 'integer'] });
      expect(inferType(4.2)).toEqual({ type: ['null', 'number'] });
      expect(inferType('hello')).toEqual({ type: ['null', 'string'] });
      expect(inferType(null)).toEqual({ type: 'null' });
      expect(inferType(undefined)).toEqual({ type: 'null' });
    });

    it('should mark ISO-8601 date-times', () => {
      expect(inferType('2024-01-15T10:00:00Z')).toEqual({ type: ['null', 'string'], format: 'date-time' });
      expect(inferType('2024-01-15T10:00:00.123+02:00')).toEqual({
        type: ['null', 'string'],
        format: 'date-time'
      });
    });

    it('should leave arrays and objects open', () => {
      expect(inferType([1, 'two'])).toEqual({ type: ['null', 'array'], items: {} });
      expect(inferType({ nested: true })).toEqual({ type: ['null', 'object'], additionalProperties: true });
    });
  });

  describe('isIsoDateTime', () => {
    it('should reject plain dates and free text', () => {
      expect(isIsoDateTime('2024-01-15')).toBe(false);
      expect(isIsoDateTime('yesterday')).toBe(false);
      expect(isIsoDateTime('2024-01-15T10:00')).toBe(true);
    });
  });

  describe('inferSchema', () => {
    it('should infer one descriptor per field of the sample record', () => {
      const schema = inferSchema([
        { a: true, b: 42, c: 4.2, s: 'hello', d: '2024-01-15T10:00:00Z', n: null }
      ]);

      expect(schema).toEqual({
        $schema: JSON_SCHEMA_DRAFT,
        type: 'object',
        properties: {
          a: { type: ['null', 'boolean'] },
          b: { type: ['null', 'integer'] },
          c: { type: ['null', 'number'] },
          s: { type: ['null', 'string'] },
          d: { type: ['null', 'string'], format: 'date-time' },
          n: { type: 'null' }
        },
        additionalProperties: true
      });
    });

    it('should let the first record decide and later records only add fields', () => {
      const schema = inferSchema([
        { _id: '1', score: 1 },
        { _id: '2', score: 1.5, tags: ['x'] }
      ]);

      expect(schema.properties).toEqual({
        _id: { type: ['null', 'string'] },
        score: { type: ['null', 'integer'] },
        tags: { type: ['null', 'array'], items: {} }
      });
    });

    it('should return the fallback for an empty sample', () => {
      expect(inferSchema([])).toBe(FALLBACK_SCHEMA);
      expect(Object.keys(FALLBACK_SCHEMA.properties)).toEqual(['_id', 'updatedAt', 'createdAt']);
    });
  });
});
