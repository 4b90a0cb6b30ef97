/**
 * Notification texts for accepted signals. HTML-flavoured, for chat
 * channels that render <b>.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import type { OpenAction, TodayStats } from "./types.js";

const PRICE_PLACES = 5;

export interface OpenedSignal {
	readonly action: OpenAction;
	readonly symbol: string;
	readonly price: number;
	readonly signalId: number;
}

export interface ClosedSignal {
	readonly symbol: string;
	readonly closePrice: number;
	readonly signalId: number;
	readonly pnl: LibDecimal;
}

export function formatOpenedMessage(
	signal: OpenedSignal,
	stats: TodayStats,
	dailyCap: number,
	nowMs: number,
): string {
	const lines = [
		`<b>${signal.action} SIGNAL</b>`,
		"",
		`<b>Symbol:</b> ${escapeHtml(signal.symbol)}`,
		`<b>Price:</b> ${formatPrice(signal.price)}`,
		`<b>Time:</b> ${formatUtc(nowMs)} UTC`,
		`<b>Signal ID:</b> #${signal.signalId}`,
		"",
		"<b>Today's Stats:</b>",
		`  Signals: ${stats.totalSignals}/${capLabel(dailyCap)}`,
		`  Buys: ${stats.buys} | Sells: ${stats.sells}`,
		`  Closed: ${stats.closed} (W:${stats.wins} L:${stats.losses})`,
	];
	if (!stats.totalPnl.isZero()) {
		lines.push(`  Total P&L: ${stats.totalPnl.toSignedFixed(PRICE_PLACES)}`);
	}
	return lines.join("\n");
}

export function formatClosedMessage(signal: ClosedSignal, stats: TodayStats, dailyCap: number): string {
	return [
		"<b>CLOSE SIGNAL</b>",
		"",
		`<b>Symbol:</b> ${escapeHtml(signal.symbol)}`,
		`<b>Close Price:</b> ${formatPrice(signal.closePrice)}`,
		`<b>Closed Signal ID:</b> #${signal.signalId}`,
		`<b>P&L:</b> ${signal.pnl.toSignedFixed(PRICE_PLACES)}`,
		"",
		"<b>Today's Stats:</b>",
		`  Signals: ${stats.totalSignals}/${capLabel(dailyCap)}`,
		`  Closed: ${stats.closed} (W:${stats.wins} L:${stats.losses})`,
		`  Total P&L: ${stats.totalPnl.toSignedFixed(PRICE_PLACES)}`,
	].join("\n");
}

function capLabel(dailyCap: number): string {
	return dailyCap === 0 ? "Unlimited" : String(dailyCap);
}

function formatPrice(price: number): string {
	return LibDecimal.from(price).toFixed(PRICE_PLACES);
}

/** "YYYY-MM-DD HH:MM:SS" */
function formatUtc(ms: number): string {
	return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

function escapeHtml(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
