import { AppError } from '../../src/utils/AppError';

class DerivedError extends AppError {}

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 500, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 400);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should keep the prototype of subclasses', () => {
      const error = new DerivedError('Derived', 418);

      expect(error).toBeInstanceOf(DerivedError);
      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('DerivedError');
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 400);

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create bad request error', () => {
      const error = AppError.badRequest('Invalid input');

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Invalid input');
    });

    it('should create not found error', () => {
      expect(AppError.notFound()).toMatchObject({ statusCode: 404, message: 'Resource not found' });
      expect(AppError.notFound('Batch not found').message).toBe('Batch not found');
    });

    it('should create conflict error', () => {
      expect(AppError.conflict('Already queued').statusCode).toBe(409);
    });

    it('should create unprocessable error', () => {
      expect(AppError.unprocessable('No rows').statusCode).toBe(422);
    });

    it('should create too many requests error', () => {
      expect(AppError.tooManyRequests()).toMatchObject({ statusCode: 429, message: 'Too many requests' });
    });

    it('should create a non-operational internal error', () => {
      const error = AppError.internal();

      expect(error.statusCode).toBe(500);
      expect(error.message).toBe('Internal server error');
      expect(error.isOperational).toBe(false);
    });
  });
});
