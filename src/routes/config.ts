/**
 * Configuration routes - list/get/create/update/delete for channels,
 * sources and sites over the entity store
 */

import express, { Request, Response, Router } from 'express';
import { z } from 'zod';
import { EntityStore } from '../database/EntityStore';
import { EntityDataMap, EntityKind, EntityMap } from '../database/models';
import { ValidationError } from '../middleware/errorHandler';
import {
  channelBodySchema,
  idParamSchema,
  siteBodySchema,
  sourceBodySchema,
} from '../utils/validation';

interface EntityRouteOptions<K extends EntityKind> {
  kind: K;
  schema: z.ZodType<EntityDataMap[K], z.ZodTypeDef, unknown>;
  // Optional ?<param>=<id> filter on the list endpoint
  parentFilter?: {
    param: string;
    list: (parentId: number) => EntityMap[K][];
  };
}

const parseId = (value: unknown, name: string): number => {
  const result = idParamSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${name}`);
  }
  return result.data;
};

const createEntityRouter = <K extends EntityKind>(
  store: EntityStore,
  { kind, schema, parentFilter }: EntityRouteOptions<K>,
): Router => {
  const router = express.Router();

  /**
   * GET /
   * List every record, or the children of one parent
   */
  router.get('/', (req: Request, res: Response) => {
    const parentId =
      parentFilter && req.query[parentFilter.param] !== undefined
        ? parseId(req.query[parentFilter.param], parentFilter.param)
        : undefined;

    const data =
      parentFilter && parentId !== undefined ? parentFilter.list(parentId) : store.list(kind);

    res.json({ success: true, data });
  });

  /**
   * GET /:id
   */
  router.get('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id, 'id');
    res.json({ success: true, data: store.getById(kind, id) });
  });

  /**
   * POST /
   * Create a record and return its id
   */
  router.post('/', (req: Request, res: Response) => {
    const id = store.create(kind, schema.parse(req.body));

    res.status(201).json({ success: true, data: { id } });
  });

  /**
   * PUT /:id
   * Replace every field of a record
   */
  router.put('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id, 'id');
    store.update(kind, id, schema.parse(req.body));

    res.json({ success: true, data: store.getById(kind, id) });
  });

  /**
   * DELETE /:id
   * Children are removed with their parent
   */
  router.delete('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id, 'id');
    store.delete(kind, id);

    res.json({ success: true, message: `${kind} ${id} deleted` });
  });

  return router;
};

export const createConfigRouter = (store: EntityStore): Router => {
  const router = express.Router();

  const sources = createEntityRouter(store, {
    kind: 'source',
    schema: sourceBodySchema,
    parentFilter: {
      param: 'channel_id',
      list: (channelId) => store.sources.listByChannel(channelId),
    },
  });

  /**
   * GET /sources/:id/forbidden-words
   * Channel words followed by the source's own
   */
  sources.get('/:id/forbidden-words', (req: Request, res: Response) => {
    const id = parseId(req.params.id, 'id');
    res.json({ success: true, data: store.effectiveForbiddenWords(id) });
  });

  router.use('/channels', createEntityRouter(store, { kind: 'channel', schema: channelBodySchema }));
  router.use('/sources', sources);
  router.use(
    '/sites',
    createEntityRouter(store, {
      kind: 'site',
      schema: siteBodySchema,
      parentFilter: {
        param: 'source_id',
        list: (sourceId) => store.sites.listBySource(sourceId),
      },
    }),
  );

  return router;
};

export default createConfigRouter;
