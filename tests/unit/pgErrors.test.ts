import {
     isConcurrencyConflict,
     isConnectionFailure,
     isUniqueViolation,
} from '@lotledger/shared/src/utils/pg-errors';

describe('pg error classification', () => {
     it('should recognise retriable conflicts', () => {
          expect(isConcurrencyConflict({ code: '40001' })).toBe(true);
          expect(isConcurrencyConflict({ code: '40P01' })).toBe(true);
          expect(isConcurrencyConflict({ code: '55P03' })).toBe(true);
          expect(isConcurrencyConflict({ code: '23505' })).toBe(false);
          expect(isConcurrencyConflict(new Error('plain'))).toBe(false);
     });

     it('should recognise connection failures', () => {
          expect(isConnectionFailure({ code: '08006' })).toBe(true);
          expect(isConnectionFailure({ code: '57P01' })).toBe(true);
          expect(isConnectionFailure({ code: 'ECONNRESET' })).toBe(true);
          expect(isConnectionFailure(new Error('Connection terminated unexpectedly'))).toBe(true);
          expect(isConnectionFailure({ code: '40001' })).toBe(false);
          expect(isConnectionFailure('offline')).toBe(false);
     });

     it('should match unique violations by constraint', () => {
          const error = { code: '23505', constraint: 'item_name_key' };

          expect(isUniqueViolation(error)).toBe(true);
          expect(isUniqueViolation(error, 'item_name_key')).toBe(true);
          expect(isUniqueViolation(error, 'lot_lot_number_key')).toBe(false);
          expect(isUniqueViolation({ code: '23503' })).toBe(false);
     });
});
