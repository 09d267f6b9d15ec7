/**
 * キャンペーン入札最適化エンジン - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { EnvConfig, validateEnvConfig, loadEnvConfig } from "./config";
import { apiKeyAuth } from "./middleware/auth";
import { logger } from "./logger";
import { AppError, ApiResponseBuilder, ErrorCode, toAppError } from "./errors";
import { healthRoutes, optimizeRoutes } from "./routes";

// =============================================================================
// エラー変換
// =============================================================================

/**
 * body-parser 由来のエラー（不正なJSON、サイズ超過など）を AppError に変換
 */
function toRequestError(err: Error): AppError {
  if ("status" in err && typeof err.status === "number" && err.status < 500) {
    return new AppError({
      code: ErrorCode.VALIDATION_ERROR,
      message: err.message,
      statusCode: err.status,
      cause: err,
    });
  }
  return toAppError(err);
}

// =============================================================================
// アプリケーション生成
// =============================================================================

/**
 * Express app を生成（listen は行わない）
 */
export function createApp(envConfig: EnvConfig): express.Express {
  const app = express();

  // ===========================================================================
  // CORS設定
  // ===========================================================================

  const allowedOrigins: string[] = [
    // ローカル開発
    "http://localhost:3000",
    "http://localhost:8080",
    ...envConfig.corsAllowedOrigins,
  ];

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // オリジンがない場合（サーバー間通信など）は許可
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      logger.warn("CORS request blocked", { origin });
      callback(new Error("Not allowed by CORS"));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-API-Key", "X-Request-ID"],
    exposedHeaders: ["Content-Disposition", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    maxAge: 86400, // プリフライトリクエストを24時間キャッシュ
  };

  app.use(cors(corsOptions));

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  // JSONリクエストボディのパース（レポート2本分を受け取るため上限は設定で変更可能）
  app.use(express.json({ limit: envConfig.maxRequestBody }));

  // リクエストログ
  app.use(logger.requestLogger());

  const optimizeLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1分間
    limit: envConfig.rateLimitPerMinute,
    message: ApiResponseBuilder.error(
      new AppError({
        code: ErrorCode.RATE_LIMITED,
        message: "Too many requests, please try again later.",
        statusCode: 429,
        retryable: true,
      })
    ),
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ===========================================================================
  // ルーターの登録
  // ===========================================================================

  // ヘルスチェック・ルート一覧（認証なし）
  app.use("/", healthRoutes);

  // 最適化実行（API Key認証 + レート制限）
  app.use("/optimize", apiKeyAuth(envConfig.apiKey), optimizeLimiter, optimizeRoutes);

  // 未定義のルート
  app.use((req: Request, res: Response) => {
    const response = ApiResponseBuilder.notFound(`Route ${req.method} ${req.path}`);
    res.status(response.statusCode).json(response);
  });

  // エラーハンドリング
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const appError = toRequestError(err);
    if (appError.statusCode >= 500) {
      logger.error("Unhandled error", { error: err, path: req.path });
    } else {
      logger.warn("Request rejected", { error: err.message, path: req.path });
    }
    const response = ApiResponseBuilder.error(appError);
    res.status(response.statusCode).json(response);
  });

  return app;
}

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * HTTPサーバーを起動する
 *
 * @returns Promise<void> - サーバー起動完了後にresolve（プロセスは終了しない）
 */
export async function startServer(): Promise<void> {
  // 環境変数の検証
  const envValidation = validateEnvConfig();
  if (!envValidation.valid) {
    logger.error("Environment validation failed", { errors: envValidation.errors });
    // 開発環境では警告のみ、本番では起動を停止
    if (process.env.NODE_ENV === "production") {
      throw new Error(`Environment validation failed: ${envValidation.errors.join(", ")}`);
    }
  }

  const envConfig = loadEnvConfig();
  logger.setLevel(envConfig.logLevel);

  const app = createApp(envConfig);

  return new Promise<void>((resolve) => {
    app.listen(envConfig.port, () => {
      logger.info("Server started", {
        port: envConfig.port,
        environment: envConfig.nodeEnv,
        authEnabled: !!envConfig.apiKey,
        rateLimitPerMinute: envConfig.rateLimitPerMinute,
        maxRequestBody: envConfig.maxRequestBody,
      });
      // resolve() を呼ぶが、app.listen() がソケットを保持し続けるためプロセスは終了しない
      resolve();
    });
  });
}

// =============================================================================
// エントリポイント
// =============================================================================

if (require.main === module) {
  startServer().catch((error) => {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error : String(error),
    });
    process.exit(1);
  });
}
