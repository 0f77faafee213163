import { z } from 'zod';
import type { OilRepository, PageRequest } from '../db/oilRepository.js';
import { createLogger } from '../logger.js';
import type {
  CursorPage,
  OilResource,
  OilResourceInput,
  OilResourcePatch,
} from '../types/oil.js';
import type { StorageClient, UploadUrlRequest, UploadUrlResponse } from '../types/storage.js';
import { AppError, NotFoundError } from '../utils/errors.js';

const logger = createLogger('OilService');

export const DEFAULT_PAGE_SIZE = 50;

export interface PageParams {
  cursor?: string;
  size?: number;
}

const CursorSchema = z.object({
  direction: z.enum(['next', 'prev']),
  id: z.string().min(1),
});

type Cursor = z.infer<typeof CursorSchema>;

function encodeCursor(cursor: Cursor): string {
  return Buffer.from(JSON.stringify(cursor)).toString('base64url');
}

export function decodeCursor(value: string): Cursor {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(value, 'base64url').toString('utf-8'));
  } catch (error) {
    logger.debug({ err: error }, 'Undecodable pagination cursor');
    raw = null;
  }
  const parsed = CursorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError('Invalid pagination cursor', 400, 'invalid_cursor');
  }
  return parsed.data;
}

const RELATIVE_URL_BASE = 'http://localhost';

/**
 * Object key of a stored document: its URL path without the leading slash.
 * Relative values such as `uploads/a.pdf` are taken as paths.
 */
export function documentKeyFromUrl(documentUrl: string): string {
  return new URL(documentUrl, RELATIVE_URL_BASE).pathname.replace(/^\/+/, '');
}

function notFound(id: string): NotFoundError {
  return new NotFoundError(`Oil resource with ID ${id} not found`);
}

export interface OilService {
  getOil(id: string): Promise<OilResource>;
  getAllOil(params?: PageParams): Promise<CursorPage<OilResource>>;
  createOil(input: OilResourceInput, userId: string, email: string): Promise<OilResource>;
  updateOil(id: string, patch: OilResourcePatch): Promise<OilResource>;
  deleteOil(id: string): Promise<boolean>;
  generateUploadUrl(request: UploadUrlRequest): Promise<UploadUrlResponse>;
}

export function createOilService(repository: OilRepository, storage: StorageClient): OilService {
  return {
    async getOil(id) {
      const oil = repository.get(id);
      if (!oil) {
        throw notFound(id);
      }
      logger.info({ id }, 'Retrieved oil resource');
      return oil;
    },

    async getAllOil(params = {}) {
      const size = params.size ?? DEFAULT_PAGE_SIZE;
      let request: PageRequest = { direction: 'next', size };
      if (params.cursor) {
        const cursor = decodeCursor(params.cursor);
        request =
          cursor.direction === 'prev'
            ? { direction: 'prev', before: cursor.id, size }
            : { direction: 'next', after: cursor.id, size };
      }

      const slice = repository.page(request);
      const total = repository.count();
      const first = slice.items[0];
      const last = slice.items[slice.items.length - 1];

      logger.info({ count: slice.items.length, total }, 'Retrieved oil resources page');

      return {
        items: slice.items,
        total,
        current_page: params.cursor ?? null,
        previous_page: slice.hasPrevious && first ? encodeCursor({ direction: 'prev', id: first.id }) : null,
        next_page: slice.hasNext && last ? encodeCursor({ direction: 'next', id: last.id }) : null,
      };
    },

    async createOil(input, userId, email) {
      const created = repository.create({ ...input, userId, email });
      logger.info(
        { id: created.id, date: created.date, userId: created.userId },
        'Created oil resource',
      );
      return created;
    },

    async updateOil(id, patch) {
      const updated = repository.update(id, patch);
      if (!updated) {
        throw notFound(id);
      }
      logger.info({ id }, 'Updated oil resource');
      return updated;
    },

    async deleteOil(id) {
      const existing = repository.get(id);
      if (!existing) {
        throw notFound(id);
      }

      repository.delete(id);

      if (existing.oil_document_url) {
        try {
          const key = documentKeyFromUrl(existing.oil_document_url);
          await storage.deleteFile(key);
          logger.info({ key }, 'Deleted associated document file');
        } catch (error) {
          logger.error({ err: error, id }, 'Failed to delete associated document file');
          throw new AppError('Failed to delete associated document', 500, 'storage_error');
        }
      }

      logger.info({ id }, 'Deleted oil resource');
      return true;
    },

    async generateUploadUrl(request) {
      try {
        const upload = await storage.getUploadUrl(request.key ?? '', request.metadata);
        logger.info({ key: upload.key }, 'Generated upload URL');
        return upload;
      } catch (error) {
        logger.error({ err: error }, 'Failed to generate upload URL');
        throw new AppError('Failed to generate upload URL', 500, 'storage_error');
      }
    },
  };
}
