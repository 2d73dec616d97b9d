/**
 * Converter Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  BufferConverter,
  JsonConverter,
  StringConverter,
  isConverter,
  type ByteSink,
} from '../../converter/index.js';
import { ConverterError } from '../../errors.js';

function collect(): { sink: ByteSink; bytes: () => Buffer } {
  const chunks: Buffer[] = [];
  return {
    sink: {
      write: (chunk) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
      },
    },
    bytes: () => Buffer.concat(chunks),
  };
}

describe('StringConverter', () => {
  it('should encode text as UTF-8', () => {
    const out = collect();
    new StringConverter().toBytes('héllo', out.sink);

    expect(out.bytes().length).toBe(6);
    expect(new StringConverter().fromBytes(out.bytes())).toBe('héllo');
  });
});

describe('BufferConverter', () => {
  it('should not share memory with the caller', () => {
    const source = Buffer.from([1, 2, 3]);
    const decoded = new BufferConverter().fromBytes(source);
    source[0] = 9;

    expect(Array.from(decoded)).toEqual([1, 2, 3]);
  });
});

describe('JsonConverter', () => {
  const schema = z.object({ id: z.number(), tags: z.array(z.string()) });
  const converter = new JsonConverter(schema);

  it('should encode values as JSON text', () => {
    const out = collect();
    converter.toBytes({ id: 7, tags: ['a'] }, out.sink);

    expect(out.bytes().toString('utf8')).toBe('{"id":7,"tags":["a"]}');
  });

  it('should decode values that match the schema', () => {
    expect(converter.fromBytes(Buffer.from('{"id":1,"tags":[]}'))).toEqual({ id: 1, tags: [] });
  });

  it('should reject malformed JSON', () => {
    expect(() => converter.fromBytes(Buffer.from('{"id":'))).toThrow(ConverterError);
  });

  it('should reject payloads that do not match the schema', () => {
    expect(() => converter.fromBytes(Buffer.from('{"id":"1","tags":[]}'))).toThrow(
      'Payload does not match schema at id: Expected number, received string'
    );
  });
});

describe('isConverter', () => {
  it('should recognize the converter contract', () => {
    expect(isConverter(new StringConverter())).toBe(true);
    expect(isConverter({ fromBytes: () => 1 })).toBe(false);
    expect(isConverter(null)).toBe(false);
  });
});
