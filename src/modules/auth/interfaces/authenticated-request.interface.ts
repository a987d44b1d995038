import { Request } from 'express';
import { User } from '../../user/entities/user.entity';

export interface JwtPayload {
  sub: string;
  email: string;
}

export interface AuthenticatedRequest extends Request {
  user: User;
}

/** Request on a route where authentication is optional. */
export interface MaybeAuthenticatedRequest extends Request {
  user?: User | false;
}
