import { Request } from 'express';

export interface RequestUser {
  userId: string;
}

export interface AuthenticatedRequest extends Request {
  user?: RequestUser;
}
