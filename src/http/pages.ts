/**
 * HTML pages served by the portal and the router.
 *
 * Every interpolated value goes through `escapeHtml`.
 */

import type { AuthenticatedSession } from '../core/types.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
</head>
<body>
${body}
</body>
</html>
`;
}

function errorBanner(error?: string): string {
  return error ? `<p class="error" role="alert">${escapeHtml(error)}</p>\n` : '';
}

export function landingPage(): string {
  return layout(
    'Employee Portal',
    `<h1>Employee Portal</h1>
<p><a href="/employee/login">Employee sign in</a></p>`
  );
}

/** Human-readable liveness page for the router. */
export function routerStatusPage(evidence: string): string {
  return layout('Portal Router', `<h2>Portal Router (${escapeHtml(evidence)}) is running.</h2>`);
}

export interface LoginPageOptions {
  departments: string[];
  error?: string;
  username?: string;
  department?: string;
}

export function loginPage(options: LoginPageOptions): string {
  const choices = options.departments
    .map((name) => {
      const selected = name === options.department ? ' selected' : '';
      return `<option value="${escapeHtml(name)}"${selected}>${escapeHtml(name)}</option>`;
    })
    .join('\n');

  return layout(
    'Employee Login',
    `<h1>Employee Login</h1>
${errorBanner(options.error)}<form method="post" action="/employee/login">
<label>Username <input name="username" value="${escapeHtml(options.username ?? '')}" autocomplete="username" required></label>
<label>Password <input name="password" type="password" autocomplete="current-password" required></label>
<label>Department <select name="department" required>
<option value="">Select department</option>
${choices}
</select></label>
<button type="submit">Continue</button>
</form>`
  );
}

export interface TotpPageOptions {
  fullName: string;
  department: string;
  error?: string;
}

export function totpPage(options: TotpPageOptions): string {
  return layout(
    'Two-Factor Authentication',
    `<h1>Two-Factor Authentication</h1>
<p>${escapeHtml(options.fullName)} (${escapeHtml(options.department)})</p>
${errorBanner(options.error)}<form method="post" action="/employee/totp">
<label>Authenticator code <input name="totp_code" inputmode="numeric" autocomplete="one-time-code" maxlength="7" required></label>
<button type="submit">Verify</button>
</form>
<p><a href="/employee/login">Start over</a></p>`
  );
}

export function dashboardPage(department: string, session: AuthenticatedSession): string {
  const { identity } = session;
  return layout(
    `${department} Dashboard`,
    `<h1>${escapeHtml(department)} Dashboard</h1>
<p>Signed in as ${escapeHtml(identity.fullName)} (${escapeHtml(identity.email)})</p>
<p>Session expires ${escapeHtml(session.expiresAt.toISOString())}</p>
<p><a href="/logout">Sign out</a></p>`
  );
}

export interface ErrorPageOptions {
  statusCode: number;
  message: string;
  /** Rendered as a sign-out link when set */
  signOutPath?: string;
}

const ERROR_TITLES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Authentication Required',
  403: 'Access Denied',
  404: 'Not Found',
  500: 'Server Error',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export function errorPage(options: ErrorPageOptions): string {
  const title = ERROR_TITLES[options.statusCode] ?? 'Error';
  const signOut = options.signOutPath
    ? `\n<p><a href="${escapeHtml(options.signOutPath)}">Sign out and log in again</a></p>`
    : '';
  return layout(
    title,
    `<h1>${options.statusCode} ${escapeHtml(title)}</h1>
<p>${escapeHtml(options.message)}</p>${signOut}`
  );
}
