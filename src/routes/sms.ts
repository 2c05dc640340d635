import express, { Router, Response, NextFunction } from 'express';
import { FALLBACK_REPLY, type MessagePipeline } from '../services/pipeline.js';
import { validateInboundSms, validateInboundTest, ValidatedRequest } from '../middleware/validation.js';
import { smsRateLimit } from '../middleware/rateLimit.js';
import { HttpError } from '../middleware/errorHandler.js';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, char => XML_ESCAPES[char]);
}

/**
 * TwiML document that makes the provider send `message` back as an SMS
 */
export function toTwiml(message: string): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    `  <Message>${escapeXml(message)}</Message>`,
    '</Response>',
  ].join('\n');
}

export function createSmsRouter(pipeline: MessagePipeline): Router {
  const router = Router();

  /**
   * POST /sms/inbound
   *
   * Provider webhook (application/x-www-form-urlencoded).
   * Fields: From (sender phone), Body (SMS text).
   * Response: TwiML with the reply. If generation fails the farmer
   * gets an apology instead and the error is logged.
   */
  router.post(
    '/sms/inbound',
    smsRateLimit,
    express.urlencoded({ extended: false }),
    validateInboundSms,
    async (req: ValidatedRequest, res: Response) => {
      const phone = req.validatedPhone ?? '';
      const text = req.validatedText ?? '';

      let reply: string;
      try {
        const result = await pipeline.handle(phone, text);
        reply = result.reply;
      } catch (error) {
        console.error('Error in /sms/inbound:', error);
        reply = FALLBACK_REPLY;
      }

      res.type('application/xml').send(toTwiml(reply));
    }
  );

  /**
   * POST /test/inbound
   *
   * Run the full pipeline from JSON, for local testing.
   * Request body: { phone: string, text: string }
   * Response: { status, messageId, turnId, reply }
   */
  router.post(
    '/test/inbound',
    smsRateLimit,
    validateInboundTest,
    async (req: ValidatedRequest, res: Response, next: NextFunction) => {
      const { validatedPhone, validatedText } = req;
      if (!validatedPhone || !validatedText) {
        next(new HttpError(400, 'Missing "phone" or "text" in request body'));
        return;
      }

      try {
        const result = await pipeline.handle(validatedPhone, validatedText);
        res.json({
          status: 'ok',
          messageId: result.incomingId,
          turnId: result.turnId,
          reply: result.reply,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
