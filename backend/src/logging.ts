import debug from 'debug';

export const NAMESPACES = {
  server: {
    main: 'storynest:server:main',
    http: 'storynest:server:http',
    auth: 'storynest:server:auth'
  },
  services: {
    books: 'storynest:services:books',
    sessions: 'storynest:services:sessions',
    messages: 'storynest:services:messages',
    users: 'storynest:services:users'
  },
  agents: {
    base: 'storynest:agents:base',
    storyBuddy: 'storynest:agents:storybuddy',
    controller: 'storynest:agents:controller'
  },
  llm: {
    client: 'storynest:llm:client',
    custom: 'storynest:llm:custom',
    messages: 'storynest:llm:messages'
  },
  jobs: {
    writes: 'storynest:jobs:writes'
  },
  config: 'storynest:config'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Enable namespaces from configuration unless DEBUG was set in the environment,
 * which always wins.
 */
export function enableNamespaces(namespaces: string | undefined): void {
  if (process.env.DEBUG || !namespaces) return;
  debug.enable(namespaces);
}
