/**
 * AuthService - Scoped JWTs for bridges and dashboard readers
 */

import jwt from 'jsonwebtoken';
import { v4 as uuid } from 'uuid';
import type { NextFunction, Request, Response } from 'express';
import { ErrorCode, createPermissionError, createUnauthorizedError } from '../schemas/errors.js';

const DEFAULT_TOKEN_EXPIRY = 24 * 60 * 60 * 1000; // 24 hours

/** Permissions a token may carry; `*` grants everything */
export type Permission = 'bridge' | 'audit:read' | '*';

export interface TokenPayload {
  /** Bridge or dashboard identity */
  subject: string;
  permissions: Permission[];
  issuedAt: number;
  expiresAt: number;
}

const KNOWN_PERMISSIONS: readonly string[] = ['bridge', 'audit:read', '*'];

function isPermission(value: unknown): value is Permission {
  return typeof value === 'string' && KNOWN_PERMISSIONS.includes(value);
}

export class AuthService {
  private secret: string;
  private tokenExpiry: number;

  constructor(secret?: string, tokenExpiry?: number) {
    this.secret = secret || process.env.JWT_SECRET || uuid();
    this.tokenExpiry = tokenExpiry || DEFAULT_TOKEN_EXPIRY;

    if (!secret && !process.env.JWT_SECRET) {
      console.warn('[Auth] No JWT_SECRET set, using random secret (tokens will not persist across restarts)');
    }
  }

  /**
   * Generate a token for a bridge or dashboard client
   */
  generateToken(client: { subject: string; permissions: Permission[] }): string {
    const now = Date.now();
    const payload: TokenPayload = {
      subject: client.subject,
      permissions: client.permissions,
      issuedAt: now,
      expiresAt: now + this.tokenExpiry,
    };

    return jwt.sign(payload, this.secret, { expiresIn: Math.floor(this.tokenExpiry / 1000) });
  }

  /**
   * Verify and decode a token
   */
  verifyToken(token: string): TokenPayload | null {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch {
      return null;
    }

    if (typeof decoded === 'string') return null;

    const { subject, permissions, issuedAt, expiresAt } = decoded;
    if (
      typeof subject !== 'string' ||
      !Array.isArray(permissions) ||
      typeof issuedAt !== 'number' ||
      typeof expiresAt !== 'number'
    ) {
      return null;
    }

    // Check expiration
    if (expiresAt < Date.now()) {
      return null;
    }

    return { subject, permissions: permissions.filter(isPermission), issuedAt, expiresAt };
  }

  hasPermission(payload: TokenPayload, permission: Permission): boolean {
    return payload.permissions.includes('*') || payload.permissions.includes(permission);
  }

  /**
   * Extract the bearer token from an authorization header
   */
  extractToken(authHeader: string | undefined): string | null {
    if (!authHeader) return null;
    const token = authHeader.replace(/^Bearer\s+/i, '').trim();
    return token || null;
  }

  /**
   * Express middleware requiring a valid token with `permission`.
   * The verified payload is left on `res.locals.auth`.
   */
  middleware(permission: Permission) {
    return (req: Request, res: Response, next: NextFunction): void => {
      const token = this.extractToken(req.headers.authorization);
      if (!token) {
        res.status(401).json(createUnauthorizedError(ErrorCode.UNAUTHORIZED, 'No authorization header'));
        return;
      }

      const payload = this.verifyToken(token);
      if (!payload) {
        res.status(401).json(createUnauthorizedError(ErrorCode.INVALID_TOKEN, 'Invalid or expired token'));
        return;
      }

      if (!this.hasPermission(payload, permission)) {
        res.status(403).json(createPermissionError(permission));
        return;
      }

      res.locals.auth = payload;
      next();
    };
  }
}

export default AuthService;
