import { Router, Response, NextFunction } from 'express';
import type { GlossaryService } from '../services/glossary.js';
import { previewRateLimit } from '../middleware/rateLimit.js';
import { validatePreviewInput, ValidatedRequest } from '../middleware/validation.js';

export function createGlossaryRouter(glossary: GlossaryService): Router {
  const router = Router();

  /**
   * POST /glossary/preview
   *
   * Show which glossary entries each word of a text would pull into
   * a translation prompt.
   *
   * Request body: { text: string, source?: 'tsn' | 'en' }
   * Response: { source, matches: TokenPreview[] }
   */
  router.post(
    '/glossary/preview',
    previewRateLimit,
    validatePreviewInput,
    (req: ValidatedRequest, res: Response, next: NextFunction) => {
      const source = req.validatedSource ?? 'tsn';
      try {
        const matches = glossary.previewMatches(req.validatedText ?? '', source);
        res.json({ source, matches });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /glossary/stats
   *
   * Entry and key counts of the loaded glossary.
   */
  router.get('/glossary/stats', (_req, res: Response) => {
    const index = glossary.getIndex();
    res.json({
      entries: index.entries.length,
      setswanaForms: index.setswanaForms.length,
      englishForms: index.englishForms.length,
      scorer: glossary.scorer.name,
    });
  });

  return router;
}
