/**
 * Example: coalescing refresh requests per tag
 *
 * Three widgets ask for refreshes far faster than a refresh completes. Each
 * widget gets one refresh in flight; requests arriving meanwhile collapse
 * into the latest one.
 */

import { createTaggedLimiter } from '../../src/index.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  const { limiter, close } = createTaggedLimiter({ limit: 1 });

  limiter.on('dropped', (tag) => console.log(`[${tag}] superseded a pending refresh`));

  for (let request = 1; request <= 5; request++) {
    for (const widget of ['inbox', 'calendar', 'weather']) {
      const queued = limiter.submit(widget, async () => {
        console.log(`[${widget}] refreshing (request ${request})`);
        await sleep(50);
      });
      console.log(`[${widget}] request ${request} ${queued ? 'pending' : 'started'}`);
    }
    await sleep(10);
  }

  const drained = await close();
  console.log(drained ? 'All refreshes settled' : 'Timed out waiting for refreshes');
  console.log(limiter.getStats());
}

main().catch(console.error);
