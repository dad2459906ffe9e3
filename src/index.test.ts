import { describe, it, expect } from 'vitest';
import * as api from './index.js';

describe('package exports', () => {
  it('should expose the connection and not a way to construct handles directly', () => {
    expect(typeof api.CouchConnection.create).toBe('function');
    expect(typeof api.createIndexFields).toBe('function');
    expect('Database' in api).toBe(false);
  });
});
