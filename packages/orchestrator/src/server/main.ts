import { loadConfig } from '../config.js';
import { startServer } from './start.js';

function writeLine(line: string): void {
  process.stderr.write(`${line}\n`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const running = await startServer(config, { log: writeLine });
  writeLine(`listening on http://${config.host}:${running.port}`);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    writeLine(`${signal} received, shutting down`);
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        writeLine(`shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  writeLine(`fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
