/**
 * Inspector Controller
 * HTTP request/response handling for inspection endpoints
 */

import { Request, Response } from 'express';
import { inspectorService } from './inspector.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import {
  IAnalyzeRequest,
  IAnalyzeResponse,
  ICandidatesRequest,
  ICandidatesResponse,
  IFieldsRequest,
  IFieldsResponse,
  IFrameworksResponse,
  IPreviewRequest,
  IPreviewResponse,
} from './inspector.types';

type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw new ApiError(400, 'Request body must be a JSON object');
  }
  return body;
}

function requireHtml(body: Body): string {
  if (typeof body.html !== 'string') {
    throw new ApiError(400, 'html must be a string');
  }
  return body.html;
}

function requireItemSelector(body: Body): string {
  const { itemSelector } = body;
  if (typeof itemSelector !== 'string' || !itemSelector.trim()) {
    throw new ApiError(400, 'itemSelector must be a non-empty string');
  }
  return itemSelector;
}

function optionalInteger(body: Body, key: string, min: number): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ApiError(400, `${key} must be an integer of at least ${min}`);
  }
  return value;
}

function requireFieldSelectors(body: Body): Record<string, string> {
  const { fieldSelectors } = body;
  if (!isRecord(fieldSelectors)) {
    throw new ApiError(400, 'fieldSelectors must be an object');
  }

  const selectors: Record<string, string> = {};
  for (const [fieldName, selector] of Object.entries(fieldSelectors)) {
    if (typeof selector !== 'string') {
      throw new ApiError(400, `fieldSelectors.${fieldName} must be a string`);
    }
    selectors[fieldName] = selector;
  }
  return selectors;
}

export class InspectorController {
  /**
   * POST /api/inspect/analyze
   * Full structural report for a page
   */
  analyze = asyncHandler(async (req: Request, res: Response) => {
    const body = readBody(req);
    const request: IAnalyzeRequest = {
      html: requireHtml(body),
      url: typeof body.url === 'string' ? body.url : null,
    };
    if (request.url === null && body.url !== undefined && body.url !== null) {
      throw new ApiError(400, 'url must be a string');
    }

    const response: IAnalyzeResponse = {
      success: true,
      analysis: inspectorService.analyze(request.html, request.url),
    };

    res.json(response);
  });

  /**
   * POST /api/inspect/candidates
   * Repeated item candidates
   */
  candidates = asyncHandler(async (req: Request, res: Response) => {
    const body = readBody(req);
    const request: ICandidatesRequest = {
      html: requireHtml(body),
      minRepeat: optionalInteger(body, 'minRepeat', 2),
    };

    const response: ICandidatesResponse = {
      success: true,
      candidates: inspectorService.findCandidates(request.html, request.minRepeat),
    };

    res.json(response);
  });

  /**
   * POST /api/inspect/fields
   * Field selectors for the items matched by itemSelector
   */
  fields = asyncHandler(async (req: Request, res: Response) => {
    const body = readBody(req);
    const request: IFieldsRequest = {
      html: requireHtml(body),
      itemSelector: requireItemSelector(body),
    };

    const response: IFieldsResponse = {
      success: true,
      ...inspectorService.suggestFields(request.html, request.itemSelector),
    };

    res.json(response);
  });

  /**
   * POST /api/inspect/preview
   * Records extracted with the given selectors
   */
  preview = asyncHandler(async (req: Request, res: Response) => {
    const body = readBody(req);
    const request: IPreviewRequest = {
      html: requireHtml(body),
      itemSelector: requireItemSelector(body),
      fieldSelectors: requireFieldSelectors(body),
      limit: optionalInteger(body, 'limit', 1),
    };

    const response: IPreviewResponse = {
      success: true,
      records: inspectorService.preview(
        request.html,
        request.itemSelector,
        request.fieldSelectors,
        request.limit
      ),
    };

    res.json(response);
  });

  /**
   * GET /api/inspect/frameworks
   * Known framework profiles
   */
  frameworks = asyncHandler(async (_req: Request, res: Response) => {
    const response: IFrameworksResponse = {
      success: true,
      profiles: inspectorService.listFrameworks(),
    };

    res.json(response);
  });
}

export const inspectorController = new InspectorController();
