/**
 * Document Creation Tests
 *
 * @see src/services/documents/create-document.ts
 */

import { describe, it, expect } from 'vitest';
import { createDocument } from '../../../src/services/documents/create-document.js';
import { ValidationError } from '../../../src/utils/errors.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('createDocument', () => {
  it('creates an empty document with identifying metadata', () => {
    const doc = createDocument({
      human_identifier: 'report-7',
      title: 'Quarterly report',
      url: 'https://example.com/report-7',
      text: 'Sales rose.',
      metadata: { source: 'test' },
    });

    expect(doc.id).toMatch(UUID_V4);
    expect(doc.human_identifier).toBe('report-7');
    expect(doc.title).toBe('Quarterly report');
    expect(doc.url).toBe('https://example.com/report-7');
    expect(doc.text).toBe('Sales rose.');
    expect(doc.metadata).toEqual({ source: 'test' });
    expect(doc.preprocess_metadata).toEqual({});
    expect(doc.tokens).toEqual([]);
    expect(doc.offsets).toEqual([]);
    expect(doc.postags).toEqual([]);
    expect(doc.sentences).toEqual([]);
    expect(doc.entities).toEqual([]);
    expect(Number.isNaN(Date.parse(doc.creation_date))).toBe(false);
  });

  it('fills defaults for optional fields', () => {
    const doc = createDocument({ human_identifier: 'bare' });

    expect(doc.title).toBeNull();
    expect(doc.url).toBeNull();
    expect(doc.text).toBe('');
    expect(doc.metadata).toEqual({});
  });

  it('assigns a distinct id to each document', () => {
    const a = createDocument({ human_identifier: 'a' });
    const b = createDocument({ human_identifier: 'b' });
    expect(a.id).not.toBe(b.id);
  });

  it('rejects an empty identifier', () => {
    let caught: unknown;
    try {
      createDocument({ human_identifier: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      rule: 'invalid-input',
      message: 'human_identifier: Human identifier is required',
    });
  });

  it('rejects a malformed URL', () => {
    expect(() => createDocument({ human_identifier: 'x', url: 'not a url' })).toThrow(
      'url: URL must be a valid URL'
    );
  });
});
