import { Router, type NextFunction, type Response } from "express";
import { z } from "zod";
import type {
  ReviewActionResponse,
  ReviewDetailResponse,
  ReviewListResponse
} from "@graphmerge/shared";
import { validate } from "../middleware/validator.js";
import { getReviewServiceSingleton } from "../runtime/graphRuntime.js";
import {
  ReviewNotFoundError,
  ReviewTargetNotFoundError,
  type ReviewService
} from "../services/ReviewService.js";

const reviewParamsSchema = z.object({
  id: z.string().min(1)
});

const listQuerySchema = z.object({
  status: z.enum(["pending", "approved", "rejected"]).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

const reviewerSchema = z.object({
  reviewer: z.string().trim().min(1),
  notes: z.string().optional()
});

const approveBodySchema = reviewerSchema.extend({
  nodeId: z.string().min(1).optional()
});

const mergeBodySchema = reviewerSchema.extend({
  targetNodeId: z.string().min(1)
});

interface CreateReviewsRouterOptions {
  service?: ReviewService;
}

function handleReviewError(error: unknown, res: Response, next: NextFunction): void {
  if (error instanceof ReviewNotFoundError || error instanceof ReviewTargetNotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  next(error);
}

export function createReviewsRouter(options: CreateReviewsRouterOptions = {}): Router {
  const getService = () => options.service ?? getReviewServiceSingleton();
  const reviewsRouter = Router();

  reviewsRouter.get("/", validate({ query: listQuerySchema }), (req, res) => {
    const query = listQuerySchema.parse(req.query);
    const response: ReviewListResponse = getService().list(query);
    res.json(response);
  });

  reviewsRouter.get("/:id", validate({ params: reviewParamsSchema }), (req, res, next) => {
    try {
      const response: ReviewDetailResponse = { review: getService().getReview(req.params.id ?? "") };
      res.json(response);
    } catch (error) {
      handleReviewError(error, res, next);
    }
  });

  reviewsRouter.post(
    "/:id/approve",
    validate({ params: reviewParamsSchema, body: approveBodySchema }),
    async (req, res, next) => {
      try {
        const response: ReviewActionResponse = await getService().approve(
          req.params.id ?? "",
          approveBodySchema.parse(req.body)
        );
        res.json(response);
      } catch (error) {
        handleReviewError(error, res, next);
      }
    }
  );

  reviewsRouter.post(
    "/:id/reject",
    validate({ params: reviewParamsSchema, body: reviewerSchema }),
    (req, res, next) => {
      try {
        const response: ReviewActionResponse = getService().reject(
          req.params.id ?? "",
          reviewerSchema.parse(req.body)
        );
        res.json(response);
      } catch (error) {
        handleReviewError(error, res, next);
      }
    }
  );

  reviewsRouter.post(
    "/:id/merge",
    validate({ params: reviewParamsSchema, body: mergeBodySchema }),
    async (req, res, next) => {
      try {
        const response: ReviewActionResponse = await getService().merge(
          req.params.id ?? "",
          mergeBodySchema.parse(req.body)
        );
        res.json(response);
      } catch (error) {
        handleReviewError(error, res, next);
      }
    }
  );

  return reviewsRouter;
}
