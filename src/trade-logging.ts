/**
 * Trade logging control
 * Toggle agent trade/decision logs on or off, or follow one agent.
 * Entries stay in a bounded in-memory buffer that the CLI can dump.
 */

export type TradeLoggingMode = "all" | "none" | string; // "all", "none", or an agent id like "shorter-12"

export interface TradeLogEntry {
  step: number;
  agentId: string;
  message: string;
}

let loggingMode: TradeLoggingMode = "none";

const MAX_LOG_ENTRIES = 50000;
const logBuffer: TradeLogEntry[] = [];
const logCounts = new Map<string, number>();

export function setTradeLoggingMode(mode: TradeLoggingMode): void {
  loggingMode = mode;
  logCounts.clear();
}

export function getTradeLoggingMode(): TradeLoggingMode {
  return loggingMode;
}

export function shouldLogAgent(agentId: string): boolean {
  if (!agentId) return false;
  if (loggingMode === "none") return false;
  if (loggingMode === "all") return true;
  return loggingMode === agentId;
}

/**
 * Append a trade line for an agent (no-op unless logging covers it)
 */
export function logTrade(agentId: string, step: number, message: string): void {
  if (!shouldLogAgent(agentId)) return;

  logBuffer.push({ step, agentId, message });
  logCounts.set(agentId, (logCounts.get(agentId) ?? 0) + 1);

  if (logBuffer.length > MAX_LOG_ENTRIES) {
    logBuffer.splice(0, logBuffer.length - MAX_LOG_ENTRIES);
  }
}

export function logDecision(agentId: string, step: number, message: string): void {
  logTrade(agentId, step, `[DECISION ${agentId}] ${message}`);
}

/**
 * Copy of the buffer, oldest first
 */
export function getTradeLogs(): TradeLogEntry[] {
  return logBuffer.slice();
}

export function clearTradeLogs(): void {
  logBuffer.length = 0;
  logCounts.clear();
}

export function formatTradeLog(entry: TradeLogEntry): string {
  return `[step ${entry.step}] ${entry.agentId}: ${entry.message}`;
}

/**
 * Busiest agents since the last mode change or clear
 */
export function getTradeLogStats(): {
  totalLogs: number;
  topAgents: Array<{ agentId: string; logCount: number }>;
} {
  const topAgents = Array.from(logCounts.entries())
    .map(([agentId, logCount]) => ({ agentId, logCount }))
    .sort((a, b) => b.logCount - a.logCount || a.agentId.localeCompare(b.agentId))
    .slice(0, 10);

  return { totalLogs: logBuffer.length, topAgents };
}
