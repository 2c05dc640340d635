import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

const WINDOW_MS = 60 * 1000; // 1 minute

function perMinute(max: number, message: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too Many Requests', message },
  });
}

// Every SMS costs one or more model calls
export const smsRateLimit = perMinute(60, 'Please wait before sending more messages');

// Glossary previews are in-memory lookups
export const previewRateLimit = perMinute(300, 'Please slow down glossary previews');
