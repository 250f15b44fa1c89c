/**
 * @file test/search.test.ts
 * @description Unit tests for concurrent search fan-out / fan-in
 */

import { SearchCoordinator, buildSearchPrompt } from '../src/services/pipeline/search';
import { AIProviderError } from '../src/types/errors';
import { RecordingGateway, waitForAbort } from './support/fakeAgents';

function planOf(queries: string[]) {
  return { searches: queries.map(query => ({ query, reason: `reason for ${query}` })) };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('SearchCoordinator', () => {
  it('should build the searcher prompt from query and reason', () => {
    expect(buildSearchPrompt({ query: 'tidal energy', reason: 'baseline capacity' })).toBe(
      'Search: tidal energy\nReason: baseline capacity'
    );
  });

  it('should return one result per successful task and skip failed ones', async () => {
    const gateway = new RecordingGateway({
      searcher: async prompt => {
        if (prompt.includes('bad')) {
          throw new AIProviderError('openai', 'HTTP 500: upstream');
        }
        return `result: ${prompt.split('\n')[0]}`;
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });

    const results = await coordinator.execute(planOf(['good-1', 'bad-1', 'good-2', 'bad-2', 'good-3']));

    expect(results).toHaveLength(3);
    expect([...results].sort()).toEqual([
      'result: Search: good-1',
      'result: Search: good-2',
      'result: Search: good-3',
    ]);
    expect(gateway.callsFor('searcher')).toHaveLength(5);
  });

  it('should return an empty collection when every task fails', async () => {
    const gateway = new RecordingGateway({
      searcher: async () => {
        throw new Error('network down');
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });

    await expect(coordinator.execute(planOf(['a', 'b']))).resolves.toEqual([]);
  });

  it('should handle an empty plan without calling the searcher', async () => {
    const gateway = new RecordingGateway();
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });
    const onProgress = jest.fn();

    await expect(coordinator.execute({ searches: [] }, { onProgress })).resolves.toEqual([]);
    expect(onProgress).not.toHaveBeenCalled();
    expect(gateway.calls).toHaveLength(0);
  });

  it('should collect results in completion order', async () => {
    const gateway = new RecordingGateway({
      searcher: async prompt => {
        if (prompt.includes('slow')) {
          await delay(30);
        }
        return prompt.split('\n')[0];
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });

    const results = await coordinator.execute(planOf(['slow', 'fast']));

    expect(results).toEqual(['Search: fast', 'Search: slow']);
  });

  it('should report progress after every completion', async () => {
    const gateway = new RecordingGateway({
      searcher: async prompt => {
        if (prompt.includes('fails')) throw new Error('boom');
        return 'ok';
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });
    const onProgress = jest.fn();

    await coordinator.execute(planOf(['one', 'fails', 'three']), { onProgress });

    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('should respect a concurrency cap without changing the results', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const gateway = new RecordingGateway({
      searcher: async prompt => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return prompt.split('\n')[0];
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 2 });

    const results = await coordinator.execute(planOf(['a', 'b', 'c', 'd', 'e']));

    expect(maxInFlight).toBe(2);
    expect([...results].sort()).toEqual(['Search: a', 'Search: b', 'Search: c', 'Search: d', 'Search: e']);
  });

  it('should run every task at once without a cap', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const gateway = new RecordingGateway({
      searcher: async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return 'ok';
      },
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });

    await coordinator.execute(planOf(['a', 'b', 'c', 'd']));

    expect(maxInFlight).toBe(4);
  });

  it('should drop in-flight searches when the signal aborts', async () => {
    const gateway = new RecordingGateway({
      searcher: (_prompt, context) => waitForAbort(context),
    });
    const coordinator = new SearchCoordinator(gateway, { concurrency: 0 });
    const controller = new AbortController();

    const pending = coordinator.execute(planOf(['a', 'b', 'c']), { signal: controller.signal });
    controller.abort();

    await expect(pending).resolves.toEqual([]);
  });
});
