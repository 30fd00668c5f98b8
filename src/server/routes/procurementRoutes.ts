import { Router, Request, Response } from 'express';
import multer from 'multer';
import type { z } from 'zod';
import { asyncHandler } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import { BadRequestError } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { procurementRequestSchemas } from '../validation/procurementSchemas.js';
import type { ExtractionPipeline } from '../services/procurement/ExtractionPipeline.js';
import type { TitleClassifier } from '../services/procurement/CommodityClassifier.js';

type ExtractBody = z.infer<typeof procurementRequestSchemas.extractBody>;
type ClassifyBody = z.infer<typeof procurementRequestSchemas.classifyBody>;

export interface ProcurementRouterDeps {
    pipeline: Pick<ExtractionPipeline, 'run'>;
    classifier: TitleClassifier;
    maxUploadBytes: number;
}

export const OFFER_FILE_FIELD = 'offer_file';

export function createProcurementRouter({ pipeline, classifier, maxUploadBytes }: ProcurementRouterDeps): Router {
    const router = Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadBytes, files: 1 },
    });

    /**
     * POST /api/procurement/extractions
     * Multipart upload of a vendor offer (field "offer_file") with an optional "title".
     * Always answers 200 with a PipelineResult; a failed extraction tells the client
     * to fall back to manual entry and still carries a commodity suggestion.
     */
    router.post(
        '/extractions',
        upload.single(OFFER_FILE_FIELD),
        validate({ body: procurementRequestSchemas.extractBody }),
        asyncHandler(async (req: Request, res: Response) => {
            const file = req.file;
            if (!file) {
                throw new BadRequestError('No offer file uploaded', { field: OFFER_FILE_FIELD });
            }
            const body: ExtractBody = req.body;
            const log = createChildLogger({ route: 'procurement-extraction', fileName: file.originalname });

            // Abandon the model call when the client disconnects before we answer
            const controller = new AbortController();
            const onClose = () => {
                if (!res.writableFinished) {
                    log.info('Client disconnected; cancelling extraction');
                    controller.abort();
                }
            };
            res.on('close', onClose);

            try {
                const result = await pipeline.run(
                    { bytes: file.buffer, mediaType: file.mimetype, fileName: file.originalname },
                    { title: body.title, signal: controller.signal }
                );
                if (controller.signal.aborted) {
                    return;
                }
                res.json(result);
            } finally {
                res.off('close', onClose);
            }
        })
    );

    /**
     * POST /api/procurement/classifications
     * Suggest a commodity group for a title without a document
     */
    router.post(
        '/classifications',
        validate({ body: procurementRequestSchemas.classifyBody }),
        (req: Request, res: Response) => {
            const body: ClassifyBody = req.body;
            res.json(classifier.classify(body.title));
        }
    );

    /**
     * GET /api/procurement/commodity-groups
     * Taxonomy known to the classifier, for the manual selection dropdown
     */
    router.get('/commodity-groups', (_req: Request, res: Response) => {
        res.json({ groups: classifier.labels() });
    });

    return router;
}
