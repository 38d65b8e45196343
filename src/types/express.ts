import { Actor } from '../models/User';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
      correlationId?: string;
    }
  }
}

export {};
