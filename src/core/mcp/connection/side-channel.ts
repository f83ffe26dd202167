/**
 * Side-channel monitor.
 *
 * Records what a server reports outside its tool-call responses (stderr lines,
 * log notifications, transport errors) so that `invoke` can tell a call that
 * succeeded quietly from one whose failure was only ever printed.
 */

import type { Logger } from '../../logger/index.js';
import type { SideChannelConfig } from '../config.js';
import { LOG_PREFIXES, SIDE_CHANNEL_BUFFER_SIZE } from '../constants.js';
import type { SideChannelMessage } from '../types.js';

interface RecordedMessage extends SideChannelMessage {
	seq: number;
}

export class SideChannelMonitor {
	private readonly buffer: RecordedMessage[] = [];
	private readonly failurePattern: RegExp;
	private seq = 0;

	constructor(
		private readonly serverId: string,
		private readonly config: SideChannelConfig,
		private readonly logger: Logger
	) {
		this.failurePattern = new RegExp(config.failurePattern);
	}

	/**
	 * Record one message. Stderr arrives unclassified (`info`); it is promoted to
	 * `error` when it matches the failure pattern.
	 */
	record(message: SideChannelMessage): void {
		const level =
			message.source === 'stderr' && this.failurePattern.test(message.text)
				? 'error'
				: message.level;
		const entry: RecordedMessage = { ...message, level, seq: ++this.seq };

		this.buffer.push(entry);
		if (this.buffer.length > SIDE_CHANNEL_BUFFER_SIZE) {
			this.buffer.shift();
		}

		if (level === 'error') {
			this.logger.warn(`${LOG_PREFIXES.SIDE_CHANNEL} [${this.serverId}] ${message.text}`, {
				serverId: this.serverId,
				source: message.source,
			});
		} else {
			this.logger.debug(`${LOG_PREFIXES.SIDE_CHANNEL} [${this.serverId}] ${message.text}`);
		}
	}

	/** Position to pass to `errorsSince` */
	mark(): number {
		return this.seq;
	}

	/**
	 * Error-level lines recorded after `cursor`. Always empty when monitoring is disabled.
	 */
	errorsSince(cursor: number): string[] {
		if (!this.config.enabled) return [];
		return this.buffer
			.filter(entry => entry.seq > cursor && entry.level === 'error')
			.map(entry => entry.text);
	}

	/** Most recent messages, oldest first */
	recent(limit = 20): SideChannelMessage[] {
		return this.buffer.slice(-limit).map(({ seq: _seq, ...message }) => message);
	}
}
