/**
 * Ask the production-line agent one question from the terminal.
 *
 *   tsx backend/src/scripts/ask.ts "Where is the bottleneck right now?" --thread line-1 --stream
 */

import { parseArgs } from 'node:util';
import { ProductionAgent } from '../services/agentService.js';

async function ask(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      thread: { type: 'string', short: 't' },
      stream: { type: 'boolean', short: 's', default: false }
    }
  });

  const question = positionals.join(' ').trim();
  if (!question) {
    throw new Error('Usage: ask "<question>" [--thread <id>] [--stream]');
  }

  const agent = new ProductionAgent();
  try {
    if (values.stream) {
      for await (const event of agent.stream(question, values.thread)) {
        if (event.type === 'step') {
          for (const entry of event.entries) {
            console.log(`[${entry.phase}] ${entry.message}`);
          }
        } else if (event.type === 'answer_start') {
          console.log('');
        } else if (event.type === 'answer_chunk') {
          process.stdout.write(event.chunk);
        } else if (event.type === 'final') {
          console.log(`\n\nThread: ${event.state.threadId}`);
        }
      }
      return;
    }

    const state = await agent.run(question, values.thread);
    for (const step of state.steps) {
      console.log(step);
    }
    console.log(`\n${state.data.answer ?? ''}`);
    console.log(`\nThread: ${state.threadId}`);
    console.log(`Confidence: ${(state.outputValidation?.confidence ?? 1).toFixed(2)}`);
  } finally {
    await agent.close();
  }
}

ask()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    console.error('\n❌ Request failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
