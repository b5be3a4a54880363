/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler: wraps async route handlers to catch errors automatically
 * typedRoute: combines Zod validation + asyncHandler for type-safe routes
 *
 * Validation failures are handed to the error handler as ValidationError,
 * so every 400 has the same body shape.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

/** Request with a typed validatedBody after Zod validation */
export type TypedRequest<TBody = unknown, TParams = Request['params'], TQuery = Request['query']> =
    Omit<Request, 'validatedBody'> & {
        validatedBody: TBody;
        params: TParams & Request['params'];
        query: TQuery & Request['query'];
    };

type TypedHandler<TBody, TParams, TQuery> = (
    req: TypedRequest<TBody, TParams, TQuery>,
    res: Response,
) => Promise<void | Response>;

// ============================================
// asyncHandler: for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute: Zod body validation + asyncHandler
// ============================================

/**
 * Combines Zod body validation with asyncHandler in one call.
 * Returns a RequestHandler[] to spread into router methods.
 *
 * @example
 * router.post('/', ...typedRoute(JerseyTemplateSchema, async (req, res) => {
 *     const template = req.validatedBody; // ← fully typed
 *     res.json({ id: await createTemplate(req.store, template) });
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.infer<T>, Record<string, string>, Record<string, string>>,
): RequestHandler[] {
    const validateMiddleware: RequestHandler = (req: Request, _res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            next(ValidationError.fromIssues(result.error.issues));
            return;
        }
        req.validatedBody = result.data;
        next();
    };

    return [
        validateMiddleware,
        asyncHandler(handler as unknown as AsyncRequestHandler),
    ];
}

/**
 * Like typedRoute but also validates params. Params are checked first, so
 * a malformed id is rejected before the body is looked at.
 *
 * @example
 * router.post('/:order_id/status', ...typedRouteWithParams(OrderIdParamSchema, UpdateOrderStatusSchema, async (req, res) => {
 *     const { order_id } = req.params; // ← typed from OrderIdParamSchema
 * }));
 */
export function typedRouteWithParams<
    TParams extends z.ZodTypeAny,
    TBody extends z.ZodTypeAny,
>(
    paramsSchema: TParams,
    bodySchema: TBody | null,
    handler: TypedHandler<z.infer<TBody>, z.infer<TParams>, Record<string, string>>,
): RequestHandler[] {
    const validateMiddleware: RequestHandler = (req: Request, _res: Response, next: NextFunction): void => {
        const paramsResult = paramsSchema.safeParse(req.params);
        if (!paramsResult.success) {
            next(ValidationError.fromIssues(paramsResult.error.issues, 'Invalid params'));
            return;
        }
        Object.assign(req.params, paramsResult.data);

        if (bodySchema) {
            const bodyResult = bodySchema.safeParse(req.body);
            if (!bodyResult.success) {
                next(ValidationError.fromIssues(bodyResult.error.issues));
                return;
            }
            req.validatedBody = bodyResult.data;
        }

        next();
    };

    return [
        validateMiddleware,
        asyncHandler(handler as unknown as AsyncRequestHandler),
    ];
}

export default asyncHandler;
