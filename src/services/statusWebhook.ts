import { Dispatcher, fetch } from "undici";
import { logger } from "../logger";
import { recordCollaboratorError, startCollaboratorTimer } from "../metrics";
import type { ResearchTask } from "../types/research";

export interface StatusWebhookOptions {
  url: string;
  apiKey?: string;
  dispatcher?: Dispatcher;
}

/** Notifies an external workflow whenever a task changes status. Failures are logged, never raised. */
export class StatusWebhook {
  constructor(private readonly options: StatusWebhookOptions) {}

  async notify(task: ResearchTask): Promise<boolean> {
    const stopTimer = startCollaboratorTimer("status_webhook");
    try {
      const response = await fetch(this.options.url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(this.options.apiKey ? { "x-api-key": this.options.apiKey } : {}),
        },
        body: JSON.stringify({
          task_id: task.id,
          status: task.status,
          summary: task.summary,
          warnings: task.warnings,
          updated_at: task.updated_at,
        }),
        signal: AbortSignal.timeout(10000),
        dispatcher: this.options.dispatcher,
      });
      if (!response.ok) {
        const text = await response.text();
        logger.warn({ taskId: task.id, status: response.status, text }, "Status webhook rejected notification");
        recordCollaboratorError("status_webhook", "status");
        return false;
      }
      await response.body?.cancel();
      return true;
    } catch (error) {
      logger.warn({ taskId: task.id, error }, "Status webhook unreachable");
      recordCollaboratorError("status_webhook", "transport");
      return false;
    } finally {
      stopTimer();
    }
  }
}
