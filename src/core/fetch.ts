import { Agent } from "undici";

let sharedAgent: Agent | undefined;
let insecureAgent: Agent | undefined;

function createAgent(rejectUnauthorized: boolean): Agent {
  return new Agent({
    keepAliveTimeout: 10_000,
    connections: 8,
    connect: {
      rejectUnauthorized,
    },
  });
}

/**
 * Pooled transport shared by every archive request of a run. The insecure
 * variant is only handed out when TLS verification has been switched off.
 */
export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent {
  if (ignoreHttpsErrors) {
    if (!insecureAgent) {
      insecureAgent = createAgent(false);
    }
    return insecureAgent;
  }

  if (!sharedAgent) {
    sharedAgent = createAgent(true);
  }
  return sharedAgent;
}

export async function closeFetchDispatchers(): Promise<void> {
  const agents = [sharedAgent, insecureAgent].filter((agent): agent is Agent => agent !== undefined);
  sharedAgent = undefined;
  insecureAgent = undefined;
  await Promise.all(agents.map((agent) => agent.close()));
}
