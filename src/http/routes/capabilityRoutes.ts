// src/http/routes/capabilityRoutes.ts

/**
 * GET /v1/capabilities
 *
 * Lists what the model can call: the registered descriptors and the exact
 * tool declarations sent with every model request.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';

import type { CapabilityDescriptor } from '../../components/domain/Capability';
import type { ToolDeclaration } from '../../components/application/ToolSchemaTranslator';

export type CapabilityCatalogPort = {
  listCapabilities(): CapabilityDescriptor[];
  listTools(): ToolDeclaration[];
};

export function createCapabilityRoutes(catalog: CapabilityCatalogPort): Router {
  const router = Router();

  router.get('/v1/capabilities', (_req: Request, res: Response) => {
    return res.status(200).json({
      capabilities: catalog.listCapabilities(),
      tools: catalog.listTools(),
    });
  });

  return router;
}
