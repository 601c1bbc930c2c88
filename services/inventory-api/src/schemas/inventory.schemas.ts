import {
     errorResponseSchema,
     ledgerSnapshotSchema,
     reservationSchema,
} from '@stockledger/shared/src/http/schemas';

export const reserveStockSchema = {
     tags: ['inventory'],
     summary: 'Reserve stock for a holder',
     description:
          'Atomically moves quantity from available to reserved under a row lock and returns a reservation that expires after its TTL.',
     body: {
          type: 'object',
          required: ['sku', 'quantity', 'holderId'],
          properties: {
               sku: { type: 'string', minLength: 1, example: 'BMW-F30-AC-001' },
               variantSku: { type: 'string', example: 'LEFT' },
               quantity: {
                    type: 'integer',
                    description: 'Quantity to reserve',
                    minimum: 1,
                    example: 5,
               },
               holderId: {
                    type: 'string',
                    minLength: 1,
                    description: 'Cart, session or order holding the stock',
                    example: 'user-1',
               },
               ttlMinutes: {
                    type: 'integer',
                    minimum: 1,
                    description: 'Minutes until the hold expires (server default when omitted)',
                    example: 30,
               },
               orderId: { type: 'string', example: 'ORD-2026-00042' },
               source: { type: 'string', example: 'web-cart' },
          },
     },
     response: {
          201: {
               description: 'Stock reserved',
               type: 'object',
               properties: {
                    reservationId: { type: 'string', format: 'uuid' },
                    remainingAvailable: { type: 'integer', example: 15 },
                    expiresAt: { type: 'string', format: 'date-time' },
               },
          },
          400: { description: 'Invalid request', ...errorResponseSchema },
          404: { description: 'No ledger entry for the product', ...errorResponseSchema },
          409: { description: 'Insufficient stock', ...errorResponseSchema },
          503: { description: 'Concurrent modification or storage unavailable', ...errorResponseSchema },
     },
};

export const releaseStockSchema = {
     tags: ['inventory'],
     summary: 'Release reserved stock',
     description:
          'Releases one reservation by id, or whole active reservations of the product oldest first. Quantity omitted releases everything targeted.',
     body: {
          type: 'object',
          required: ['sku', 'reason'],
          properties: {
               sku: { type: 'string', minLength: 1, example: 'BMW-F30-AC-001' },
               variantSku: { type: 'string' },
               quantity: { type: 'integer', minimum: 1, example: 5 },
               reservationId: { type: 'string', minLength: 1 },
               reason: { type: 'string', minLength: 1, example: 'cart abandoned' },
          },
     },
     response: {
          200: {
               description: 'Stock released',
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'ok' },
                    releasedQuantity: { type: 'integer', example: 5 },
                    reservationIds: { type: 'array', items: { type: 'string' } },
               },
          },
          400: { description: 'Invalid request', ...errorResponseSchema },
          404: { description: 'Ledger entry or reservation not found', ...errorResponseSchema },
          409: { description: 'Over-release or reservation no longer active', ...errorResponseSchema },
          503: { description: 'Concurrent modification or storage unavailable', ...errorResponseSchema },
     },
};

export const bulkQuerySchema = {
     tags: ['inventory'],
     summary: 'Query several products at once',
     description: 'Returns one snapshot per requested key, in request order. Unknown keys yield empty snapshots.',
     body: {
          type: 'object',
          required: ['items'],
          properties: {
               items: {
                    type: 'array',
                    minItems: 1,
                    maxItems: 500,
                    items: {
                         type: 'object',
                         required: ['sku'],
                         properties: {
                              sku: { type: 'string', minLength: 1 },
                              variantSku: { type: 'string' },
                         },
                    },
               },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    items: { type: 'array', items: ledgerSnapshotSchema },
               },
          },
          400: { description: 'Invalid request', ...errorResponseSchema },
     },
};

export const getStockSchema = {
     tags: ['inventory'],
     summary: 'Get the ledger snapshot for a SKU',
     params: {
          type: 'object',
          required: ['sku'],
          properties: {
               sku: { type: 'string', description: 'SKU to query', example: 'BMW-F30-AC-001' },
          },
     },
     querystring: {
          type: 'object',
          properties: {
               variantSku: { type: 'string' },
          },
     },
     response: {
          200: { description: 'Ledger snapshot', ...ledgerSnapshotSchema },
     },
};

export const checkAvailabilitySchema = {
     tags: ['inventory'],
     summary: 'Check whether a quantity could be reserved now',
     params: {
          type: 'object',
          required: ['sku'],
          properties: {
               sku: { type: 'string' },
          },
     },
     querystring: {
          type: 'object',
          required: ['quantity'],
          properties: {
               quantity: { type: 'integer', example: 3 },
               variantSku: { type: 'string' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    available: { type: 'boolean' },
               },
          },
     },
};

export const getReservationSchema = {
     tags: ['inventory'],
     summary: 'Get a reservation by id',
     params: {
          type: 'object',
          required: ['reservationId'],
          properties: {
               reservationId: { type: 'string' },
          },
     },
     response: {
          200: reservationSchema,
          404: { description: 'Reservation not found', ...errorResponseSchema },
     },
};

export const listHolderReservationsSchema = {
     tags: ['inventory'],
     summary: 'List active reservations of a holder',
     params: {
          type: 'object',
          required: ['holderId'],
          properties: {
               holderId: { type: 'string' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    reservations: { type: 'array', items: reservationSchema },
               },
          },
     },
};
