import { EventPublisher } from "../models/types";
import { NotificationError, errorMessage } from "../utils/errors";

export interface HomeAssistantSettings {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
}

/**
 * Fires events on the Home Assistant bus. Delivery is best-effort: the
 * returned promise always resolves and failures are only logged.
 */
export class NotificationService implements EventPublisher {
  constructor(private settings: HomeAssistantSettings) {}

  async publish(eventName: string, payload: Record<string, unknown>): Promise<void> {
    const { baseUrl, token, timeoutMs } = this.settings;
    if (!token) return;

    try {
      const res = await fetch(`${baseUrl}/events/${encodeURIComponent(eventName)}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
      // nothing to read; release the connection
      await res.body?.cancel();
      if (!res.ok) {
        throw new NotificationError(`Event bus replied ${res.status}`);
      }
    } catch (error) {
      const failure =
        error instanceof NotificationError
          ? error
          : new NotificationError(errorMessage(error), error);
      console.warn(`⚠️ Event ${eventName} not delivered: ${failure.message}`);
    }
  }
}
