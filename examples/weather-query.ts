/**
 * Sends one weather question to a running agent, first as a plain send and
 * then as a streaming subscription.
 *
 * Usage: npm run query -- "Is it raining in London?"
 */

import dotenv from 'dotenv';
import { A2AClient, newTaskParams } from '../src/A2AClient.js';

dotenv.config();

const AGENT_URL = process.env.AGENT_URL || 'http://localhost:10000';

function textOf(parts: { type: string; text?: string }[] | undefined): string {
  return (parts ?? [])
    .map((part) => (part.type === 'text' ? part.text ?? '' : `[${part.type}]`))
    .join(' ');
}

async function weatherQuery(question: string) {
  console.log('🌦️  Weather Agent Query\n');

  const client = new A2AClient(AGENT_URL);

  console.log('Step 1: Fetch agent card');
  const card = await client.getAgentCard();
  console.log(`   ${card.name} v${card.version} (streaming: ${card.capabilities.streaming})`);

  console.log(`\nStep 2: tasks/send "${question}"`);
  const task = await client.sendTask(newTaskParams(question));
  console.log(`   State: ${task.status.state}`);
  for (const artifact of task.artifacts ?? []) {
    console.log(`   🤖 ${textOf(artifact.parts)}`);
  }

  console.log(`\nStep 3: tasks/sendSubscribe "${question}"`);
  for await (const event of client.sendTaskSubscribe(newTaskParams(question))) {
    if (event.error) {
      console.log(`   ❌ ${event.error.message}`);
      continue;
    }
    if (event.result && 'status' in event.result) {
      const { status, final } = event.result;
      console.log(`   [${status.state}${final ? ', final' : ''}] ${textOf(status.message?.parts)}`);
    }
  }
}

weatherQuery(process.argv[2] || "What's the weather in Tokyo?").catch(console.error);
