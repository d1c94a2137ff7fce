import type { AppConfig } from "./config"
import type { AuditDb } from "./db"
import type { Loggers } from "./logger"
import type { RequestEvaluator } from "./services/evaluator"
import type { Renderer } from "./services/renderer"

export interface ServerContext {
  config: AppConfig
  db: AuditDb
  loggers: Loggers
  evaluator: RequestEvaluator
  renderer: Renderer
}
