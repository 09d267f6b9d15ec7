/**
 * キャンペーン入札最適化エンジン - 環境変数設定
 */

import { SERVER } from "./constants";
import { LogLevel, isLogLevel } from "./logger";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;

  // 認証設定
  /** 未設定の場合は認証をスキップ */
  apiKey?: string;

  // リクエスト制御
  corsAllowedOrigins: string[];
  maxRequestBody: string;
  rateLimitPerMinute: number;
}

function parseLogLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : "info";
}

function parseOrigins(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * 環境変数を読み込み、設定オブジェクトを返す
 *
 * 不正な値はデフォルトにフォールバックする（検証は validateEnvConfig）
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  const rateLimit = parseInt(
    env.RATE_LIMIT_PER_MINUTE || String(SERVER.DEFAULT_RATE_LIMIT_PER_MINUTE),
    10
  );

  return {
    port: isNaN(port) ? SERVER.DEFAULT_PORT : port,
    nodeEnv: env.NODE_ENV || "development",
    logLevel: parseLogLevel(env.LOG_LEVEL),

    apiKey: env.API_KEY || undefined,

    corsAllowedOrigins: parseOrigins(env.CORS_ALLOWED_ORIGINS),
    maxRequestBody: env.MAX_REQUEST_BODY || SERVER.DEFAULT_BODY_LIMIT,
    rateLimitPerMinute: isNaN(rateLimit) ? SERVER.DEFAULT_RATE_LIMIT_PER_MINUTE : rateLimit,
  };
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // ポート番号の検証
  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  if (env.LOG_LEVEL && !isLogLevel(env.LOG_LEVEL)) {
    errors.push(`Invalid LOG_LEVEL value: ${env.LOG_LEVEL}`);
  }

  if (env.RATE_LIMIT_PER_MINUTE) {
    const rateLimit = parseInt(env.RATE_LIMIT_PER_MINUTE, 10);
    if (isNaN(rateLimit) || rateLimit < 1) {
      errors.push(`Invalid RATE_LIMIT_PER_MINUTE value: ${env.RATE_LIMIT_PER_MINUTE}`);
    }
  }

  if (env.MAX_REQUEST_BODY && !/^\d+(b|kb|mb|gb)?$/i.test(env.MAX_REQUEST_BODY)) {
    errors.push(`Invalid MAX_REQUEST_BODY value: ${env.MAX_REQUEST_BODY}`);
  }

  if (env.NODE_ENV === "production" && !env.API_KEY) {
    errors.push("API_KEY is required when NODE_ENV is production");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
