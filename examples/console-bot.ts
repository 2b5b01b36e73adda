import * as path from 'node:path';
import * as readline from 'node:readline';
import {
  ConsoleMessageSink,
  Dispatcher,
  MemoryStateStore,
  StepCompiler,
  StepRegistry,
  createLogger,
} from '../src';

/**
 * Interactive demo: steps.json mixes inline handlers with references into
 * handlers.ts. Type a message and press enter; "exit" quits.
 */
async function demo() {
  console.log('=== Chat Step Dispatcher Demo ===\n');

  const logger = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });
  const dispatcher = new Dispatcher({
    store: new MemoryStateStore(),
    sender: new ConsoleMessageSink(),
    logger,
    registry: new StepRegistry({
      compiler: new StepCompiler({ modulesRoot: __dirname, logger }),
      logger,
    }),
  });

  const loaded = await dispatcher.registry.bulkRegisterFromFile(
    path.join(__dirname, 'steps.json')
  );
  console.log(`Loaded steps: ${loaded.join(', ')}\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const chatId = 'console-user';

  rl.setPrompt('You: ');
  rl.prompt();
  for await (const line of rl) {
    if (line.trim() === 'exit') break;
    const conversation = await dispatcher.handleMessage(chatId, line);
    logger.info({ conversation }, 'Conversation advanced');
    rl.prompt();
  }
  rl.close();
}

demo().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
