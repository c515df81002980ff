import { AppError } from './AppError';

/**
 * Validation Error (400 Bad Request)
 * Thrown when path or query parameters are malformed
 */
export class ValidationError extends AppError {
  constructor(message: string, ticker?: string) {
    super(message, 400, ticker);
  }
}
