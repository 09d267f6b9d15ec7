/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export { default as optimizeRoutes } from "./optimize";
