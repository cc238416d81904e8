import { configFromQuery, resolveConfig } from '@/config/GameConfig';
import { createLogger, setLogLevel } from '@/core/logger';
import { Game } from '@/Game';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = resolveConfig(configFromQuery(window.location.search));
  if (config.logLevel !== null) {
    setLogLevel(config.logLevel);
  }

  document.body.style.margin = '0';
  document.body.style.background = '#000';

  const game = new Game(config);
  await game.init();
  const code = await game.run();
  game.destroy();
  log.info({ code }, 'Exited');
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start');
});
