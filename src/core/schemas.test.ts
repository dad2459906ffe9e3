import { describe, it, expect } from 'vitest';
import {
  CouchResponseSchema,
  CouchStatusSchema,
  DatabaseCreatedSchema,
  DatabaseIndexListSchema,
  DesignCreatedSchema,
  IndexCreatedSchema,
  IndexSchema,
  decode,
} from './schemas.js';
import { DecodeError } from './errors.js';
import { createIndexFields } from './database.js';
import type { DatabaseIndexList, DesignCreated } from '../types/index.js';

function throughJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

describe('schemas', () => {
  describe('round trip', () => {
    it('should keep a fully populated envelope', () => {
      const envelope = { ok: false, error: 'conflict', reason: 'Document update conflict.' };

      expect(decode(CouchResponseSchema, throughJson(envelope), 'envelope')).toEqual(envelope);
    });

    it('should keep an empty envelope empty', () => {
      expect(decode(CouchResponseSchema, throughJson({}), 'envelope')).toEqual({});
    });

    it('should keep creation results with and without optional fields', () => {
      const full: DesignCreated = {
        result: 'exists',
        id: '_design/by-type',
        name: 'by-type',
        error: 'none',
        reason: 'none',
      };

      expect(decode(DesignCreatedSchema, throughJson(full), 'design')).toEqual(full);
      expect(decode(IndexCreatedSchema, throughJson(full), 'index')).toEqual(full);
      expect(decode(DatabaseCreatedSchema, throughJson({ ok: true, id: 'x', name: 'x' }), 'db')).toEqual({
        ok: true,
        id: 'x',
        name: 'x',
      });
      expect(decode(DesignCreatedSchema, throughJson({}), 'design')).toEqual({});
    });

    it('should keep an index list', () => {
      const list: DatabaseIndexList = {
        total_rows: 2,
        indexes: [
          { name: '_all_docs', type: 'special', def: createIndexFields([{ _id: 'asc' }]) },
          { ddoc: '_design/by-path', name: 'by-path', type: 'json', def: createIndexFields(['path']) },
        ],
      };

      expect(decode(DatabaseIndexListSchema, throughJson(list), 'index list')).toEqual(list);
    });

    it('should keep a server status', () => {
      const status = {
        couchdb: 'Welcome',
        uuid: '0a959b9b8227188afc2ac26ccdf345a6',
        version: '3.3.3',
        vendor: { name: 'The Apache Software Foundation', version: '3.3.3' },
      };

      expect(decode(CouchStatusSchema, throughJson(status), 'status')).toEqual(status);
    });
  });

  describe('optional fields', () => {
    it('should read explicit null as absent', () => {
      const result = decode(CouchResponseSchema, { ok: null, error: null, reason: 'gone' }, 'envelope');

      expect(result.ok).toBeUndefined();
      expect(result.error).toBeUndefined();
      expect(result.reason).toBe('gone');
    });

    it('should drop unknown keys', () => {
      expect(decode(CouchResponseSchema, { ok: true, id: 'x', rev: '1-a' }, 'envelope')).toEqual({ ok: true });
    });
  });

  describe('decode', () => {
    it('should reject a present field with the wrong type', () => {
      let caught: unknown;
      try {
        decode(CouchResponseSchema, { ok: 'yes' }, 'envelope');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DecodeError);
      if (caught instanceof DecodeError) {
        expect(caught.message.startsWith('Invalid envelope: ok: ')).toBe(true);
        expect(caught.zodError?.issues[0].path).toEqual(['ok']);
      }
    });

    it('should name the root when the body is not an object', () => {
      expect(() => decode(CouchStatusSchema, '<html>Bad Gateway</html>', 'server status')).toThrow(
        /^Invalid server status: \(root\): /
      );
    });

    it('should reject an unknown sort direction', () => {
      expect(() =>
        decode(IndexSchema, { name: 'x', type: 'json', def: { fields: [{ path: 'up' }] } }, 'index')
      ).toThrow(DecodeError);
    });
  });
});
