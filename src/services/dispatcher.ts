import { format, parseISO } from "date-fns";
import { DeliveryError } from "../errors.js";
import { logger } from "../logger.js";
import type { DirectMessenger, Report, Result } from "../types.js";

export type Dispatcher = {
  deliver(report: Report, recipientId: string, signal?: AbortSignal): Promise<Result<void, DeliveryError>>;
};

export function formatReportMessage(report: Report): string {
  const day = format(parseISO(report.coverageDate), "MMMM dd, yyyy");
  return `📊 **Daily Summary - ${day}**\n\n${report.body.trim()}`;
}

export function createDispatcher(deps: { messenger: DirectMessenger }): Dispatcher {
  return {
    async deliver(report, recipientId, signal) {
      const text = formatReportMessage(report);
      try {
        await deps.messenger.sendDirectMessage(recipientId, text, signal);
        logger.info({ recipientId, chars: text.length, source: report.source }, "Delivered daily summary");
        return { ok: true, value: undefined };
      } catch (err) {
        const error =
          err instanceof DeliveryError
            ? err
            : new DeliveryError(recipientId, err instanceof Error ? err.message : String(err), { cause: err });
        logger.error({ err: error, recipientId }, "Failed to deliver daily summary");
        return { ok: false, error };
      }
    },
  };
}
