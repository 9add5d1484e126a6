// ===========================================
// TELEGRAM NOTIFICATION SINK
// Send-only: no polling, no command handlers
// ===========================================

import TelegramBot from 'node-telegram-bot-api';
import { logger, shortMint } from '../../utils/logger.js';
import { TokenStatus } from '../../types/index.js';
import type { CanonicalToken, StatusTransition } from '../../types/index.js';
import type { NotificationSink } from './types.js';

export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    options: { parse_mode: 'Markdown'; disable_web_page_preview: boolean }
  ): Promise<unknown>;
}

export interface TelegramSinkOptions {
  chatId: string;
  // New tokens below this invest score are not announced
  minInvestScore: number;
}

// Legacy Markdown only treats these as markup
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*[\]`])/g, '\\$1');
}

function formatUsd(value: number | null): string {
  if (value === null) return 'n/a';
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

function tokenLabel(token: CanonicalToken): string {
  const symbol = token.symbol ? escapeMarkdown(token.symbol) : 'UNKNOWN';
  return `*${symbol}* \`${token.mintAddress}\``;
}

function dexScreenerLink(mintAddress: string): string {
  return `[DexScreener](https://dexscreener.com/solana/${mintAddress})`;
}

export function formatNewToken(token: CanonicalToken): string {
  return [
    `🆕 New token ${tokenLabel(token)}`,
    `Risk: ${token.riskScore.toFixed(1)} | Invest: ${token.investScore.toFixed(1)}`,
    `Liquidity: ${formatUsd(token.market.liquidityUsd)} | Vol 24h: ${formatUsd(token.market.volume24h)}`,
    `Sources: ${token.sources.join(', ')}`,
    dexScreenerLink(token.mintAddress),
  ].join('\n');
}

export function formatStatusChange(token: CanonicalToken, transition: StatusTransition): string {
  return [
    `🔄 ${tokenLabel(token)}: ${transition.from} → ${transition.to}`,
    `Reason: ${escapeMarkdown(transition.reason)}`,
    dexScreenerLink(token.mintAddress),
  ].join('\n');
}

export function formatBlacklist(token: CanonicalToken, reason: string): string {
  return [
    `⛔ Blacklisted ${tokenLabel(token)}`,
    `Risk: ${token.riskScore.toFixed(1)}`,
    `Reason: ${escapeMarkdown(reason)}`,
  ].join('\n');
}

export class TelegramSink implements NotificationSink {
  constructor(
    private readonly sender: MessageSender,
    private readonly options: TelegramSinkOptions
  ) {}

  static fromToken(botToken: string, options: TelegramSinkOptions): TelegramSink {
    return new TelegramSink(new TelegramBot(botToken, { polling: false }), options);
  }

  async onNewToken(token: CanonicalToken): Promise<void> {
    if (token.investScore < this.options.minInvestScore) return;
    await this.send(formatNewToken(token));
  }

  async onStatusChange(token: CanonicalToken, transition: StatusTransition): Promise<void> {
    // Blacklisting has its own message
    if (transition.to === TokenStatus.BLACKLISTED) return;
    if (transition.to !== TokenStatus.MIGRATED && transition.to !== TokenStatus.COMPLETED) return;
    await this.send(formatStatusChange(token, transition));
  }

  async onBlacklist(token: CanonicalToken, reason: string): Promise<void> {
    logger.info({ mint: shortMint(token.mintAddress), reason }, 'Sending blacklist alert');
    await this.send(formatBlacklist(token, reason));
  }

  private async send(text: string): Promise<void> {
    await this.sender.sendMessage(this.options.chatId, text, {
      parse_mode: 'Markdown',
      disable_web_page_preview: true,
    });
  }
}
