/**
 * Document creation
 *
 * @module services/documents/create-document
 */

import { v4 as uuidv4 } from 'uuid';
import type { IEDocument } from '../../models/document.js';
import {
  DocumentCreateInput,
  validateInput,
  type DocumentCreateInputType,
} from '../../utils/validation.js';

/**
 * Create a document that has not been through any preprocess stage yet.
 *
 * @throws ValidationError (rule `invalid-input`) for a missing identifier or malformed URL
 */
export function createDocument(input: DocumentCreateInputType): IEDocument {
  const validated = validateInput(DocumentCreateInput, input);

  return {
    id: uuidv4(),
    human_identifier: validated.human_identifier,
    title: validated.title,
    url: validated.url,
    text: validated.text,
    creation_date: new Date().toISOString(),
    metadata: { ...validated.metadata },
    preprocess_metadata: {},
    tokens: [],
    offsets: [],
    postags: [],
    sentences: [],
    entities: [],
  };
}
