import os from 'node:os';

import { Agent } from 'undici';

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 60000,
    connections: Math.max(cpuCount * 2, 25),
    pipelining: 1,
  };
}

/** Connection pool shared by every upstream request. */
export const dispatcher = new Agent(getAgentOptions());

export async function destroyAgents(): Promise<void> {
  await dispatcher.close();
}
