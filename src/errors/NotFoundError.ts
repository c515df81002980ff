import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Thrown when no route matches the request
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}
