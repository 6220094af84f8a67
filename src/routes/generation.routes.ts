import { Router } from 'express';
import * as generationController from '../controllers/generation.controller';
import { validate, schemas } from '../middleware/validate';
import { attachUploads, ugcUpload } from '../middleware/upload';
import { PipelineKind } from '../models/GenerationRun';

const router = Router();

// One route per pipeline kind
router.post('/short-form', validate(schemas.shortForm), generationController.enqueueGeneration(PipelineKind.SHORT_FORM));
router.post('/long-form', validate(schemas.longForm), generationController.enqueueGeneration(PipelineKind.LONG_FORM));
router.post(
  '/short-form-v2',
  validate(schemas.shortFormV2),
  generationController.enqueueGeneration(PipelineKind.SHORT_FORM_V2)
);
router.post(
  '/long-form-v2',
  validate(schemas.longFormV2),
  generationController.enqueueGeneration(PipelineKind.LONG_FORM_V2)
);
router.post('/ebook', validate(schemas.ebook), generationController.enqueueGeneration(PipelineKind.EBOOK));

// Multipart: product photos and reference videos
router.post(
  '/ugc',
  ugcUpload,
  attachUploads,
  validate(schemas.ugc),
  generationController.enqueueGeneration(PipelineKind.UGC)
);

router.get('/:id', generationController.getGeneration);

export default router;
