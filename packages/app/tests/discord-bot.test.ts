/**
 * Tests for DiscordBot dispatch and command registration
 */

import { describe, it, expect, vi } from 'vitest';
import { getRequestId } from '@zonescope/logger';
import type { Command } from '@zonescope/discord-bot-core';
import { DiscordBot } from '../src/services/discord/discord-bot.js';
import { createServices } from '../src/bootstrap.js';
import { loadConfig } from '../src/config/index.js';
import { createInteraction, InMemoryMarketData, silentLogger } from './helpers.js';

function createBot(commands: Command[], guildId?: string) {
  const put = vi.fn(async (_route: string, _options?: unknown): Promise<unknown> => []);
  const bot = new DiscordBot({
    logger: silentLogger(),
    token: 'test-token',
    clientId: '123',
    guildId,
    commands,
    rest: { put },
  });
  return { bot, put };
}

const services = createServices(loadConfig({}), silentLogger(), new InMemoryMarketData());

describe('DiscordBot', () => {
  describe('registerSlashCommands', () => {
    it('should publish commands to the configured guild', async () => {
      const { bot, put } = createBot(services.commands, '456');

      await bot.registerSlashCommands();

      expect(put).toHaveBeenCalledTimes(1);
      expect(put.mock.calls[0]?.[0]).toBe('/applications/123/guilds/456/commands');
      expect(put.mock.calls[0]?.[1]).toEqual({
        body: [
          expect.objectContaining({ name: 'zones' }),
          expect.objectContaining({ name: 'help' }),
          expect.objectContaining({ name: 'health' }),
        ],
      });
    });

    it('should publish globally without a guild', async () => {
      const { bot, put } = createBot(services.commands);

      await bot.registerSlashCommands();

      expect(put.mock.calls[0]?.[0]).toBe('/applications/123/commands');
    });
  });

  describe('handleInteraction', () => {
    it('should run the command inside a request context keyed by the interaction id', async () => {
      let seen: string | undefined;
      const ping: Command = {
        schema: { name: 'ping', description: 'Ping' },
        handler: async () => {
          seen = getRequestId();
        },
      };
      const { bot } = createBot([ping]);

      await bot.handleInteraction(createInteraction('ping', 'interaction-42').interaction);

      expect(seen).toBe('interaction-42');
    });

    it('should route to the registered command', async () => {
      const { bot } = createBot(services.commands);
      const { interaction, reply } = createInteraction('help');

      await bot.handleInteraction(interaction);

      expect(reply).toHaveBeenCalledWith(
        expect.objectContaining({
          ephemeral: true,
          embeds: [expect.objectContaining({ title: '📖 Support & Resistance Zones' })],
        })
      );
    });

    it('should describe the configured analysis timeframes in help', async () => {
      const configured = createServices(
        loadConfig({ ANALYSIS_TIMEFRAMES: '4h,1d' }),
        silentLogger(),
        new InMemoryMarketData()
      );
      const { bot } = createBot(configured.commands);
      const { interaction, reply } = createInteraction('help');

      await bot.handleInteraction(interaction);

      expect(reply).toHaveBeenCalledWith(
        expect.objectContaining({
          embeds: [
            expect.objectContaining({
              fields: [
                expect.objectContaining({ name: 'Usage' }),
                expect.objectContaining({
                  name: 'Method',
                  value: expect.stringContaining('on 4h, 1d.'),
                }),
              ],
            }),
          ],
        })
      );
    });

    it('should answer failing commands with an error reply', async () => {
      const broken: Command = {
        schema: { name: 'broken', description: 'Always fails' },
        handler: async () => {
          throw new Error('boom');
        },
      };
      const { bot } = createBot([broken]);
      const { interaction, reply } = createInteraction('broken');

      await expect(bot.handleInteraction(interaction)).resolves.toBeUndefined();
      expect(reply).toHaveBeenCalledWith({ content: '❌ Error: boom', ephemeral: true });
    });
  });

  it('should drop its ready listener when the gateway never becomes ready', async () => {
    vi.useFakeTimers();
    try {
      const { bot } = createBot(services.commands);
      const baseline = bot.readyListenerCount();

      const waiting = bot.waitForReady(1000);
      const rejected = expect(waiting).rejects.toThrow('Discord bot ready timeout');
      expect(bot.readyListenerCount()).toBe(baseline + 1);

      vi.advanceTimersByTime(1000);
      await rejected;

      expect(bot.readyListenerCount()).toBe(baseline);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should start disconnected', () => {
    const { bot } = createBot(services.commands);

    expect(bot.getStatus()).toMatchObject({ connected: false, guilds: 0 });
  });
});
