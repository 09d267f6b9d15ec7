/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * 致命的エラー（設定・列解決）は実行を中断し、行単位の回復可能な失敗は集計のみ行う
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証エラー (401)
  UNAUTHORIZED: "UNAUTHORIZED",

  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",

  // 入力データエラー (422)
  COLUMN_RESOLUTION_ERROR: "COLUMN_RESOLUTION_ERROR",
  KEY_CONSTRUCTION_ERROR: "KEY_CONSTRUCTION_ERROR",

  // リソースエラー (404)
  NOT_FOUND: "NOT_FOUND",

  // レート制限 (429)
  RATE_LIMITED: "RATE_LIMITED",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    // スタックトレースを保持
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
      retryable: false,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors: ValidationErrorDetail[] = zodError.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError(errors);
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

/**
 * 実行設定エラー（400）
 * 重みの合計が1.0でない、KPI目標が正でない等。行処理の前に実行を中断する
 */
export class ConfigurationError extends AppError {
  public readonly violations: string[];

  constructor(message: string, violations: string[] = []) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 400,
      details: violations.length > 0 ? { violations } : undefined,
      retryable: false,
    });
    this.name = "ConfigurationError";
    this.violations = violations;
  }
}

// =============================================================================
// 入力データエラー
// =============================================================================

export type DatasetName = "internal" | "external";

/**
 * 列解決エラー（422）
 * キャンペーン名列が見つからない等、マージが成立しない場合
 */
export class ColumnResolutionError extends AppError {
  public readonly dataset: DatasetName;
  public readonly missing: string[];

  constructor(dataset: DatasetName, missing: string[], message?: string) {
    super({
      code: ErrorCode.COLUMN_RESOLUTION_ERROR,
      message:
        message ??
        `Could not resolve column(s) in ${dataset} dataset: ${missing.join(", ")}`,
      statusCode: 422,
      details: { dataset, missing },
      retryable: false,
    });
    this.name = "ColumnResolutionError";
    this.dataset = dataset;
    this.missing = missing;
  }
}

/**
 * キー生成エラー
 * siteId が整数に変換できない行。実行全体ではなく該当行のみスキップする
 */
export class KeyConstructionError extends AppError {
  public readonly campaignName: string;
  public readonly siteId: unknown;

  constructor(campaignName: string, siteId: unknown) {
    super({
      code: ErrorCode.KEY_CONSTRUCTION_ERROR,
      message: `Site id is not integer-coercible: ${String(siteId)}`,
      statusCode: 422,
      details: { campaignName, siteId },
      retryable: false,
    });
    this.name = "KeyConstructionError";
    this.campaignName = campaignName;
    this.siteId = siteId;
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
  };
  meta?: {
    requestId?: string;
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  static success<T>(
    data: T,
    options?: { statusCode?: number; requestId?: string }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  static error(error: AppError | Error, requestId?: string): ApiResponse<never> {
    if (error instanceof AppError) {
      return {
        success: false,
        statusCode: error.statusCode,
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
          retryable: error.retryable,
        },
        meta: {
          requestId,
          timestamp: new Date().toISOString(),
        },
      };
    }

    // 一般的なErrorの場合
    return {
      success: false,
      statusCode: 500,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
        retryable: false,
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  static unauthorized(message: string = "Unauthorized", requestId?: string): ApiResponse<never> {
    return {
      success: false,
      statusCode: 401,
      error: {
        code: ErrorCode.UNAUTHORIZED,
        message,
        retryable: false,
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  static notFound(resource: string, requestId?: string): ApiResponse<never> {
    return {
      success: false,
      statusCode: 404,
      error: {
        code: ErrorCode.NOT_FOUND,
        message: `${resource} not found`,
        details: { resource },
        retryable: false,
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  });
}
