// Main export file - re-exports the public API of every layer

export * from './core/index.js';

export * from './directory/directory-client.js';
export { LdapDirectoryClient, createLdapDirectoryClientFactory, type LdapDirectoryConfig } from './directory/ldap-directory-client.js';
export * from './directory/secret-store.js';

export * from './router/evidence.js';
export * from './router/token-verifier.js';
export * from './router/role-router.js';
export * from './router/backend-forwarder.js';
export * from './router/oidc-flow.js';
export { isReady, probeBackends, type BackendHealth } from './router/readiness.js';

export * from './metrics/portal-metrics.js';

export { createPortalApp, PORTAL_SESSION_COOKIE, type PortalAppOptions } from './http/portal-app.js';
export {
  createRouterApp,
  ROUTER_SESSION_COOKIE,
  type RouterAppOptions,
  type RouterOidcOptions,
  type RouterSession,
} from './http/router-app.js';
export { startHTTPServer, stopHTTPServer } from './http/server.js';

export * from './config/index.js';

export { createGateway, type Gateway, type GatewayOverrides } from './gateway.js';

// Utility exports
export * from './utils/errors.js';
