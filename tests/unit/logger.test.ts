import { logger, createChildLogger } from '@stockledger/shared/src/utils/logger';

describe('Logger', () => {
     it('should be defined', () => {
          expect(logger).toBeDefined();
     });

     it('should have standard logging methods', () => {
          expect(logger.info).toBeDefined();
          expect(logger.error).toBeDefined();
          expect(logger.warn).toBeDefined();
          expect(logger.debug).toBeDefined();
     });

     it('should honour LOG_LEVEL from the environment', () => {
          expect(logger.level).toBe('silent');
     });

     it('should log info messages', () => {
          const spy = jest.spyOn(logger, 'info');
          logger.info('Test info message');
          expect(spy).toHaveBeenCalled();
          spy.mockRestore();
     });

     it('should log errors with context', () => {
          const spy = jest.spyOn(logger, 'error');
          const err = new Error('boom');
          logger.error({ err, sku: 'SKU-1' }, 'Failed');
          expect(spy).toHaveBeenCalledWith({ err, sku: 'SKU-1' }, 'Failed');
          spy.mockRestore();
     });

     describe('createChildLogger', () => {
          it('should bind the given context', () => {
               const child = createChildLogger({ component: 'reservation-service' });
               expect(child.bindings()).toMatchObject({ component: 'reservation-service' });
               expect(child.level).toBe('silent');
          });
     });
});
