/**
 * Inspector Router
 * Route definitions for inspection endpoints
 */

import { Router } from 'express';
import { inspectorController } from './inspector.controller';

const router = Router();

/**
 * @route   POST /api/inspect/analyze
 * @desc    Analyze a page: candidates, fields, frameworks, pagination
 * @access  Public
 */
router.post('/analyze', inspectorController.analyze);

/**
 * @route   POST /api/inspect/candidates
 * @desc    Find repeated item selectors
 * @access  Public
 */
router.post('/candidates', inspectorController.candidates);

/**
 * @route   POST /api/inspect/fields
 * @desc    Suggest field selectors inside matched items
 * @access  Public
 */
router.post('/fields', inspectorController.fields);

/**
 * @route   POST /api/inspect/preview
 * @desc    Preview records extracted with a selector map
 * @access  Public
 */
router.post('/preview', inspectorController.preview);

/**
 * @route   GET /api/inspect/frameworks
 * @desc    List known framework profiles
 * @access  Public
 */
router.get('/frameworks', inspectorController.frameworks);

export default router;
