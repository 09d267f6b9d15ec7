/**
 * 最適化実行モジュール
 */

export {
  OptimizationOptions,
  OptimizationResult,
  resolveRunConfig,
  runOptimization,
} from "./optimization-run";
