import type { Logger } from "@rentwatch/shared-utils";
import { NotifierPort } from "../core/ports";

/**
 * Stand-in when no bot credentials are configured.
 * Logs messages instead of delivering them.
 */
export class LogNotifier implements NotifierPort {
  constructor(private logger: Logger) {}

  async send(text: string): Promise<boolean> {
    this.logger.info(`Message (not delivered):\n${text}`);
    return true;
  }
}
