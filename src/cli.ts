// Terminal chat with the travel booking assistant
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { createChatSession } from './assistant';
import { loadConfig } from './config/env';
import { logger } from './logger';
import { handleLine } from './session/terminal';

async function main() {
  const session = createChatSession(loadConfig());
  const rl = readline.createInterface({ input, output });
  console.log('Travel Booking Assistant. Type "exit" to quit. Commands: /profile /history');

  while (true) {
    const reply = await handleLine(session, await rl.question('you> '));
    if (reply === null) break;
    if (reply) console.log(`\n${reply}\n`);
  }

  rl.close();
  console.log('Session ended. Bye!');
}

main().catch((err) => {
  logger.fatal({ err }, 'chat ended with an error');
  process.exit(1);
});
