/**
 * Run-scoped dependencies handed to every stage.
 *
 * @module summarizer/context
 */

import type { SummaryConfig } from "../summary-config";
import type { SummaryPrompts } from "./prompt-loader";
import type { SchemaInvoker } from "./schema-invocation";

export interface StageContext {
  invoker: SchemaInvoker;
  prompts: SummaryPrompts;
  config: SummaryConfig;
  /** Language name as written into prompts ("English", "Russian", ...) */
  languageLabel: string;
}
