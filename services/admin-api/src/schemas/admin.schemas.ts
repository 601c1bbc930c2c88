import {
     errorResponseSchema,
     ledgerSnapshotSchema,
     movementSchema,
} from '@stockledger/shared/src/http/schemas';
import { STOCK_MOVEMENT_TYPES } from '@stockledger/shared/src/types/inventory.types';

export const adjustStockSchema = {
     tags: ['inventory-admin'],
     summary: 'Set available stock',
     description:
          'Sets the available count of a product to an absolute value after a receipt, stock-take or correction. Creates the ledger entry when absent.',
     params: {
          type: 'object',
          required: ['sku'],
          properties: {
               sku: { type: 'string', minLength: 1, example: 'BMW-F30-AC-001' },
          },
     },
     body: {
          type: 'object',
          required: ['newAvailable', 'reason', 'actor'],
          properties: {
               variantSku: { type: 'string' },
               newAvailable: { type: 'integer', minimum: 0, example: 20 },
               reason: { type: 'string', minLength: 1, example: 'Cycle count correction' },
               actor: { type: 'string', minLength: 1, example: 'warehouse-admin' },
               referenceId: { type: 'string', example: 'PO-2026-0117' },
               minimumStockLevel: { type: 'integer', minimum: 0 },
               reorderPoint: { type: 'integer', minimum: 0 },
          },
     },
     response: {
          200: { description: 'Updated ledger snapshot', ...ledgerSnapshotSchema },
          400: { description: 'Invalid request', ...errorResponseSchema },
          409: { description: 'New level below reserved quantity', ...errorResponseSchema },
          503: { description: 'Concurrent modification or storage unavailable', ...errorResponseSchema },
     },
};

export const listMovementsSchema = {
     tags: ['inventory-admin'],
     summary: 'Search the stock movement log',
     description: 'Newest first. Filters combine; limit defaults to 100 and is capped at 1000.',
     querystring: {
          type: 'object',
          properties: {
               sku: { type: 'string' },
               variantSku: { type: 'string' },
               type: { type: 'string', enum: [...STOCK_MOVEMENT_TYPES] },
               actor: { type: 'string' },
               referenceId: { type: 'string' },
               from: { type: 'string', format: 'date-time' },
               to: { type: 'string', format: 'date-time' },
               limit: { type: 'integer', minimum: 1, maximum: 1000 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    movements: { type: 'array', items: movementSchema },
               },
          },
          400: { description: 'Invalid filter', ...errorResponseSchema },
     },
};

export const movementStatisticsSchema = {
     tags: ['inventory-admin'],
     summary: 'Movement totals per type',
     description: 'Count and sum of absolute quantity per movement type. Defaults to the last 30 days.',
     querystring: {
          type: 'object',
          properties: {
               from: { type: 'string', format: 'date-time' },
               to: { type: 'string', format: 'date-time' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    from: { type: 'string', format: 'date-time' },
                    to: { type: 'string', format: 'date-time' },
                    statistics: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   type: { type: 'string' },
                                   count: { type: 'integer' },
                                   totalQuantity: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          400: { description: 'Invalid date range', ...errorResponseSchema },
     },
};

export const sweepReservationsSchema = {
     tags: ['inventory-admin'],
     summary: 'Run one expiration sweep now',
     description: 'Releases reservations whose TTL has passed, the same pass the sweeper worker runs on its interval.',
     response: {
          200: {
               type: 'object',
               properties: {
                    scanned: { type: 'integer' },
                    expired: { type: 'integer' },
                    skipped: { type: 'integer' },
                    failed: { type: 'integer' },
               },
          },
     },
};
