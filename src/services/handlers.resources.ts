import { getRuntimeConfig } from '../config/runtimeConfig';
import type { ResourceRegistry } from './resourceRegistry';

const startedAt = Date.now();

export interface ServerIdentity {
  name: string;
  version: string;
}

export function registerBuiltinResources(registry: ResourceRegistry, server: ServerIdentity): ResourceRegistry {
  registry.register({
    uri: 'info://server',
    name: 'Server information',
    description: 'Name, version and negotiated protocol of this server',
    mimeType: 'application/json',
    read: (uri, ctx) => {
      const info = {
        name: server.name,
        version: server.version,
        protocolVersion: ctx.session.protocolVersion ?? getRuntimeConfig().protocol.version,
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      };
      return { uri, mimeType: 'application/json', text: JSON.stringify(info) };
    },
  });

  registry.registerTemplate({
    uriTemplate: 'echo://{message}',
    name: 'Echo',
    description: 'Returns the message embedded in the URI',
    mimeType: 'text/plain',
    read: (uri, vars) => ({ uri, mimeType: 'text/plain', text: vars.message ?? '' }),
  });

  return registry;
}
