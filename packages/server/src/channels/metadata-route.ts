import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { Router, type Request, type Response } from 'express';

import type { DocumentMetadata } from '../types.js';

export function createDocumentMetadata(
  documentFile: string,
  projectDir: string,
): DocumentMetadata {
  return {
    fileUri: pathToFileURL(resolve(documentFile)).href,
    rootUri: pathToFileURL(resolve(projectDir)).href,
  };
}

/** `GET /file-uri`: the shared document and project root as file URIs. */
export function createMetadataRouter(metadata: DocumentMetadata): Router {
  const snapshot: DocumentMetadata = { ...metadata };
  const router = Router();
  router.get('/file-uri', (_req: Request, res: Response) => {
    res.json(snapshot);
  });
  return router;
}
