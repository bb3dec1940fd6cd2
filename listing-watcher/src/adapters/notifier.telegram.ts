import type { Logger } from "@rentwatch/shared-utils";
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { NotifierPort } from "../core/ports";

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  apiUrl: string;
  timeoutMs: number;
}

/**
 * Telegram Bot API sendMessage with HTML parse mode
 */
export class TelegramNotifier implements NotifierPort {
  private http: Pick<AxiosInstance, "post">;

  constructor(
    private config: TelegramConfig,
    private logger: Logger,
    http?: Pick<AxiosInstance, "post">
  ) {
    this.http = http ?? axios.create({ timeout: config.timeoutMs });
  }

  async send(text: string): Promise<boolean> {
    const url = `${this.config.apiUrl}/bot${this.config.botToken}/sendMessage`;

    try {
      const response = await this.http.post<unknown>(
        url,
        {
          chat_id: this.config.chatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: false,
        },
        { validateStatus: () => true }
      );

      const body = telegramResponseSchema.safeParse(response.data);

      if (response.status === 200 && body.success && body.data.ok) {
        this.logger.info("Telegram message sent");
        return true;
      }

      this.logger.error(
        `Telegram send failed: ${response.status}`,
        body.success ? body.data.description : response.data
      );
      return false;
    } catch (error) {
      this.logger.error("Telegram send threw:", error instanceof Error ? error.message : error);
      return false;
    }
  }
}
