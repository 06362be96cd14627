import 'express';

declare global {
  namespace Express {
    interface Request {
      uid: string;
      email?: string;
      requestId?: string;
    }
  }
}

export {};
