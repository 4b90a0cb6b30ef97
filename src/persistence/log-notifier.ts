import type { Logger } from "../lib/logger/index.js";
import type { Notifier } from "../server/types.js";

/** Writes notifications to the log, for deployments with no chat channel. */
export class LogNotifier implements Notifier {
	constructor(private readonly logger: Logger) {}

	async notify(message: string): Promise<void> {
		this.logger.info({ notification: message }, "Notification");
	}
}
