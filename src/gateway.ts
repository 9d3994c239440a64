/**
 * Gateway composition: builds every collaborator from a validated
 * configuration and hands back the two Express apps.
 *
 * Collaborators that reach the network (directory, token keys, session
 * stores) can be overridden, which is how tests run the whole gateway in
 * process.
 */

import type express from 'express';
import { AuditService } from './core/audit-service.js';
import { AuthenticationService } from './core/authentication-service.js';
import { DepartmentMap } from './core/department-map.js';
import { RolePrecedence } from './core/role-precedence.js';
import { InMemorySessionStore, type SessionStore } from './core/session-store.js';
import { SpeakeasyTotpVerifier, type TotpVerifier } from './core/totp.js';
import type { PortalSessionState } from './core/types.js';
import type { PortalConfig } from './config/schema.js';
import type { DirectoryClientFactory } from './directory/directory-client.js';
import { createLdapDirectoryClientFactory } from './directory/ldap-directory-client.js';
import { FileSecretStore, type SecondFactorSecretStore } from './directory/secret-store.js';
import { PrometheusPortalMetrics } from './metrics/portal-metrics.js';
import { BackendForwarder } from './router/backend-forwarder.js';
import { IdentityTokenEvidence, TrustedHeaderEvidence, type AuthEvidenceSource } from './router/evidence.js';
import { OidcLoginFlow, providerEndpoints, type OidcFlowState } from './router/oidc-flow.js';
import { RoleRouter } from './router/role-router.js';
import { createTokenVerifier, type IdentityTokenVerifier } from './router/token-verifier.js';
import { createPortalApp } from './http/portal-app.js';
import { createRouterApp, type RouterOidcOptions, type RouterSession } from './http/router-app.js';

export interface GatewayOverrides {
  directory?: DirectoryClientFactory;
  secrets?: SecondFactorSecretStore;
  verifier?: TotpVerifier;
  tokenVerifier?: IdentityTokenVerifier;
  sessions?: SessionStore<PortalSessionState>;
  audit?: AuditService;
  metrics?: PrometheusPortalMetrics;
  /** Token endpoint transport for the OIDC login */
  fetch?: typeof fetch;
}

export interface Gateway {
  portalApp: express.Application;
  routerApp: express.Application;
  auth: AuthenticationService;
  router: RoleRouter;
  metrics: PrometheusPortalMetrics;
  audit: AuditService;
  /** Stops the in-memory stores' cleanup timers */
  destroy(): void;
}

export function createGateway(config: PortalConfig, overrides: GatewayOverrides = {}): Gateway {
  const departments = new DepartmentMap(config.departments);
  const audit = overrides.audit ?? new AuditService({ enabled: config.audit.enabled });
  const metrics = overrides.metrics ?? new PrometheusPortalMetrics();
  const disposers: Array<() => void> = [];

  // ---- Portal --------------------------------------------------------------

  let sessions = overrides.sessions;
  if (!sessions) {
    const store = new InMemorySessionStore<PortalSessionState>();
    disposers.push(() => store.destroy());
    metrics.trackSessions(() => {
      const activeByDepartment: Record<string, number> = {};
      let pending = 0;
      for (const state of store.liveStates()) {
        if (state.stage === 'pending') {
          pending++;
        } else {
          const department = state.session.department;
          activeByDepartment[department] = (activeByDepartment[department] ?? 0) + 1;
        }
      }
      return { pending, activeByDepartment };
    });
    sessions = store;
  }

  const secrets =
    overrides.secrets ??
    (config.secondFactor.secretsFile ? new FileSecretStore(config.secondFactor.secretsFile) : undefined);

  const auth = new AuthenticationService(
    {
      userBaseDn: config.directory.userBaseDn,
      userIdAttribute: config.directory.userIdAttribute,
      defaultEmailDomain: config.directory.defaultEmailDomain,
      pendingTtlMs: config.session.pendingTtlSeconds * 1000,
      sessionLifetimeMs: config.session.lifetimeSeconds * 1000,
      totpWindow: config.secondFactor.window,
    },
    {
      directory:
        overrides.directory ??
        createLdapDirectoryClientFactory({
          url: config.directory.url,
          timeoutMs: config.directory.timeoutMs,
          connectTimeoutMs: config.directory.connectTimeoutMs,
        }),
      secrets,
      verifier: overrides.verifier ?? new SpeakeasyTotpVerifier(),
      store: sessions,
      departments,
      audit,
      metrics,
    }
  );

  const portalApp = createPortalApp({
    auth,
    departments,
    cookieSecret: config.session.cookieSecret,
    secureCookies: config.session.secureCookies,
    pendingTtlMs: config.session.pendingTtlSeconds * 1000,
    sessionLifetimeMs: config.session.lifetimeSeconds * 1000,
    landingPath: config.server.landingPath,
    metrics,
  });

  // ---- Router --------------------------------------------------------------

  const oidcConfig = config.oidc;
  let evidence: AuthEvidenceSource;
  let oidc: RouterOidcOptions | undefined;

  if (config.router.evidence === 'identity-token' && oidcConfig) {
    const tokenVerifier = overrides.tokenVerifier ?? createTokenVerifier(oidcConfig);
    evidence = new IdentityTokenEvidence(tokenVerifier, {
      roles: oidcConfig.rolesClaim,
      email: oidcConfig.emailClaim,
      username: oidcConfig.usernameClaim,
    });

    const flows = new InMemorySessionStore<OidcFlowState>();
    const routerSessions = new InMemorySessionStore<RouterSession>();
    disposers.push(() => flows.destroy(), () => routerSessions.destroy());

    const endpoints = providerEndpoints(oidcConfig.issuer);
    oidc = {
      flow: new OidcLoginFlow(
        {
          authorizationEndpoint: oidcConfig.authorizationEndpoint ?? endpoints.authorizationEndpoint,
          tokenEndpoint: oidcConfig.tokenEndpoint ?? endpoints.tokenEndpoint,
          endSessionEndpoint: oidcConfig.endSessionEndpoint ?? endpoints.endSessionEndpoint,
          clientId: oidcConfig.clientId,
          clientSecret: oidcConfig.clientSecret,
          redirectUri: oidcConfig.redirectUri,
          postLogoutRedirectUri: oidcConfig.postLogoutRedirectUri,
          scopes: oidcConfig.scopes,
        },
        flows,
        overrides.fetch
      ),
      sessions: routerSessions,
      sessionLifetimeMs: config.session.lifetimeSeconds * 1000,
    };
  } else {
    evidence = new TrustedHeaderEvidence(config.router.headers);
  }

  const router = new RoleRouter({
    evidence,
    departments,
    precedence: new RolePrecedence(config.router.rolePrecedence),
    audit,
    metrics,
  });

  const routerApp = createRouterApp({
    router,
    forwarder: new BackendForwarder({ timeoutMs: config.router.backendTimeoutMs }, { audit, metrics }),
    departments,
    readinessTimeoutMs: config.router.readinessTimeoutMs,
    signOutPath: oidc ? '/logout' : config.router.signOutPath,
    cookieSecret: config.session.cookieSecret,
    secureCookies: config.session.secureCookies,
    oidc,
    metrics,
  });

  return {
    portalApp,
    routerApp,
    auth,
    router,
    metrics,
    audit,
    destroy: () => {
      for (const dispose of disposers) {
        dispose();
      }
    },
  };
}
