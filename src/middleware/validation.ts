import { Request, Response, NextFunction } from 'express';
import { config } from '../config/index.js';
import { isLangCode } from '../services/glossary.js';
import type { LangCode } from '../types/index.js';

// Loose E.164-ish check: optional +, then digits/spaces/dashes; CLI pseudo
// numbers carry a suffix, so letters and underscores after the digits are allowed
const PHONE_REGEX = /^\+?[0-9][0-9 \-]{3,19}[A-Za-z0-9_]*$/;

/**
 * Express request with validated input attached
 */
export interface ValidatedRequest extends Request {
  validatedPhone?: string;
  validatedText?: string;
  validatedSource?: LangCode;
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({
    error: 'Bad Request',
    message,
  });
}

/**
 * Validate message text: present, non-empty, within length limit.
 * Returns the trimmed text or null after sending a 400.
 */
function checkMessageText(value: unknown, field: string, res: Response): string | null {
  if (!value || typeof value !== 'string') {
    badRequest(res, `Missing or invalid "${field}" in request body`);
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    badRequest(res, `"${field}" cannot be empty`);
    return null;
  }

  if (trimmed.length > config.validation.maxMessageLength) {
    badRequest(res, `"${field}" exceeds maximum length of ${config.validation.maxMessageLength} characters`);
    return null;
  }

  return trimmed;
}

function checkPhone(value: unknown, field: string, res: Response): string | null {
  if (!value || typeof value !== 'string') {
    badRequest(res, `Missing or invalid "${field}" in request body`);
    return null;
  }

  const trimmed = value.trim();
  if (!PHONE_REGEX.test(trimmed)) {
    badRequest(res, `"${field}" is not a valid phone number`);
    return null;
  }

  return trimmed;
}

/**
 * Middleware for the provider webhook (form-encoded `From` and `Body`).
 * On success, attaches `validatedPhone` and `validatedText`.
 */
export function validateInboundSms(
  req: ValidatedRequest,
  res: Response,
  next: NextFunction
): void {
  const { From, Body } = req.body ?? {};

  const phone = checkPhone(From, 'From', res);
  if (phone === null) return;

  const text = checkMessageText(Body, 'Body', res);
  if (text === null) return;

  req.validatedPhone = phone;
  req.validatedText = text;
  next();
}

/**
 * Middleware for POST /test/inbound (JSON `phone` and `text`)
 */
export function validateInboundTest(
  req: ValidatedRequest,
  res: Response,
  next: NextFunction
): void {
  const { phone, text } = req.body ?? {};

  const validPhone = checkPhone(phone, 'phone', res);
  if (validPhone === null) return;

  const validText = checkMessageText(text, 'text', res);
  if (validText === null) return;

  req.validatedPhone = validPhone;
  req.validatedText = validText;
  next();
}

/**
 * Middleware for POST /glossary/preview (JSON `text` and optional `source`)
 */
export function validatePreviewInput(
  req: ValidatedRequest,
  res: Response,
  next: NextFunction
): void {
  const { text, source } = req.body ?? {};

  const validText = checkMessageText(text, 'text', res);
  if (validText === null) return;

  const validSource = source ?? 'tsn';
  if (!isLangCode(validSource)) {
    badRequest(res, '"source" must be "tsn" or "en"');
    return;
  }

  req.validatedText = validText;
  req.validatedSource = validSource;
  next();
}
