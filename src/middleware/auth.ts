import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

export interface AuthenticatedRequest extends Request {
  isValidSignature?: boolean;
}

export interface AuthOptions {
  apiKey: string;
  webhookSecret: string;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

export const createAuthMiddleware = ({ apiKey, webhookSecret }: AuthOptions) =>
  (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const providedKey = req.headers['x-api-key'];
    const signature = req.headers['x-signature'];

    // Check API key
    if (typeof providedKey !== 'string' || !safeEqual(providedKey, apiKey)) {
      return res.status(401).json({ error: 'Invalid API key' });
    }

    // Requests that carry a signature must match the HMAC of their body
    if (typeof signature === 'string' && signature) {
      const body = JSON.stringify(req.body ?? {});
      const expectedSignature = crypto
        .createHmac('sha256', webhookSecret)
        .update(body)
        .digest('hex');

      if (!safeEqual(expectedSignature, signature.replace('sha256=', ''))) {
        return res.status(401).json({ error: 'Invalid signature' });
      }

      req.isValidSignature = true;
    }

    next();
  };
