// Identity verification for signed-in travellers
// Bearer tokens are HS256 JWTs issued by the sign-in service

import jwt from 'jsonwebtoken';
import { AppError } from '../../utils/errors.js';

export interface Identity {
  uid: string;
  name?: string;
  email?: string;
}

export interface IdentityVerifier {
  verify(token: string): Promise<Identity>;
}

export interface JwtIdentityOptions {
  secret: string;
  issuer?: string;
}

function readString(payload: jwt.JwtPayload, key: string): string | undefined {
  const value: unknown = payload[key];
  return typeof value === 'string' && value ? value : undefined;
}

export class JwtIdentityVerifier implements IdentityVerifier {
  constructor(private readonly options: JwtIdentityOptions) {
    if (!options.secret) {
      throw new Error('IDENTITY_TOKEN_SECRET is required');
    }
  }

  async verify(token: string): Promise<Identity> {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        ...(this.options.issuer ? { issuer: this.options.issuer } : {}),
      });
    } catch {
      throw AppError.invalidToken('Invalid or expired token');
    }

    if (typeof payload === 'string') {
      throw AppError.invalidToken('Invalid token payload');
    }

    const uid = payload.sub || readString(payload, 'uid');
    if (!uid) {
      throw AppError.invalidToken('Token has no subject');
    }

    return {
      uid,
      name: readString(payload, 'name'),
      email: readString(payload, 'email'),
    };
  }
}

// Placeholder verifier when no signing secret is configured: every token is rejected
export class DisabledIdentityVerifier implements IdentityVerifier {
  async verify(): Promise<Identity> {
    throw AppError.unauthorized('Sign-in is not configured on this server');
  }
}
