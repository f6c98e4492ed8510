import type { AxiosInstance } from "axios";
import type { AppConfig } from "../../config";
import { IqdbEngine } from "./iqdb";
import { SauceNaoEngine } from "./saucenao";
import type { SearchEngineAdapter } from "./types";

export type { SearchEngineAdapter } from "./types";
export { IqdbEngine } from "./iqdb";
export { SauceNaoEngine } from "./saucenao";

/**
 * Every engine the service can query, in the order results are preferred.
 */
export function createSearchEngines(http: AxiosInstance, config: AppConfig): SearchEngineAdapter[] {
  return [
    new SauceNaoEngine(http, {
      apiKey: config.saucenao.apiKey,
      minSimilarity: config.saucenao.minSimilarity,
      userAgent: config.http.userAgent,
    }),
    new IqdbEngine(http, config.http.browserUserAgent),
  ];
}
