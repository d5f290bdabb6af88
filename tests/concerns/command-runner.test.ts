import { describe, it, expect } from 'vitest';
import { SpawnCommandRunner } from '../../src/concerns/command-runner.js';
import { DeadlineExceededError } from '../../src/errors.js';

describe('SpawnCommandRunner', () => {
  it('should not start a command once the signal aborted', async () => {
    const controller = new AbortController();
    controller.abort(new DeadlineExceededError());

    await expect(new SpawnCommandRunner().run('theHarvester', ['-d', 'example.com'], { signal: controller.signal }))
      .rejects.toBeInstanceOf(DeadlineExceededError);
  });
});
