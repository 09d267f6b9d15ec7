/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { SERVER } from "../constants";

const router = Router();

// ルート一覧
router.get("/", (_req: Request, res: Response) => {
  return res.json({
    message: "Campaign Bid Optimizer API",
    version: process.env.npm_package_version || "1.0.0",
    endpoints: {
      health: "GET /health",
      optimize: "POST /optimize",
    },
  });
});

// ヘルスチェック
router.get("/health", (_req: Request, res: Response) => {
  return res.status(200).json({
    status: "healthy",
    timestamp: new Date().toISOString(),
    service: SERVER.SERVICE_NAME,
  });
});

export default router;
