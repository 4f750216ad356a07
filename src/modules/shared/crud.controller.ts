import type { z } from 'zod';
import type { ListOptions } from '../../connections/db/base.repository';
import { asyncHandler } from '../../utils/async-handler';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

/** The public surface of a BaseRepository the generic handlers rely on. */
export interface CrudRepository<TEntity, TCreate, TUpdate, TFilter> {
  readonly entity: string;
  list(filter: Partial<TFilter>, options?: ListOptions): Promise<TEntity[]>;
  get(id: number): Promise<TEntity>;
  create(input: TCreate): Promise<TEntity>;
  update(id: number, input: TUpdate): Promise<TEntity>;
  delete(id: number): Promise<void>;
}

export type ListQuery<TFilter> = Partial<TFilter> & ListOptions;

/**
 * Standard list/get/create/update/delete handlers for an admin-managed entity.
 * Bodies are validated by the repository; ids and query strings here.
 * Mutations leave the affected id in `res.locals.entityId` for the audit trail.
 */
export const createCrudHandlers = <TEntity extends { id: number }, TCreate, TUpdate, TFilter>(
  repository: CrudRepository<TEntity, TCreate, TUpdate, TFilter>,
  querySchema: z.ZodType<NoInfer<ListQuery<TFilter>>, z.ZodTypeDef, unknown>
) => {
  const label = repository.entity.toLowerCase();

  return {
    list: asyncHandler(async (req, res) => {
      const query = parseWith(querySchema, req.query, 'Invalid query parameters');
      const records = await repository.list(query, { limit: query.limit, offset: query.offset });
      ResponseHandler.success(res, records);
    }),

    get: asyncHandler(async (req, res) => {
      const record = await repository.get(parseId(req.params.id, `${label} id`));
      ResponseHandler.success(res, record);
    }),

    create: asyncHandler(async (req, res) => {
      const record = await repository.create(req.body);
      res.locals.entityId = record.id;
      ResponseHandler.created(res, record, `${repository.entity} created`);
    }),

    update: asyncHandler(async (req, res) => {
      const id = parseId(req.params.id, `${label} id`);
      const record = await repository.update(id, req.body ?? {});
      res.locals.entityId = id;
      ResponseHandler.success(res, record, `${repository.entity} updated`);
    }),

    remove: asyncHandler(async (req, res) => {
      const id = parseId(req.params.id, `${label} id`);
      await repository.delete(id);
      res.locals.entityId = id;
      ResponseHandler.success(res, null, `${repository.entity} deleted`);
    }),
  };
};
