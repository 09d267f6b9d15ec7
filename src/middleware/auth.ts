/**
 * キャンペーン入札最適化エンジン - 認証ミドルウェア
 */

import { Request, Response, NextFunction } from "express";
import { ApiResponseBuilder } from "../errors";
import { logger } from "../logger";

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 */
export function apiKeyAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      // API Keyが設定されていない場合は認証をスキップ
      logger.warn("API Key authentication is disabled (API_KEY not set)");
      next();
      return;
    }

    const providedKey =
      extractHeaderValue(req.headers["x-api-key"]) ??
      extractBearerToken(req.headers.authorization);

    if (!providedKey) {
      const response = ApiResponseBuilder.unauthorized(
        "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>"
      );
      res.status(response.statusCode).json(response);
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", {
        ip: req.ip,
        path: req.path,
      });
      const response = ApiResponseBuilder.unauthorized("Invalid API key");
      res.status(response.statusCode).json(response);
      return;
    }

    next();
  };
}

function extractHeaderValue(value: string | string[] | undefined): string | null {
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value || null;
}

/**
 * Authorization ヘッダーからBearerトークンを抽出
 */
function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.substring(7);
}
