/**
 * Readiness: the router is ready when at least one dashboard answers its
 * health path with 200.
 */

import type { DepartmentMap } from '../core/department-map.js';
import { buildTargetUrl } from './backend-forwarder.js';
import { errorMessage } from '../utils/errors.js';

export interface BackendHealth {
  role: string;
  url: string;
  healthy: boolean;
}

export async function probeBackends(departments: DepartmentMap, timeoutMs: number): Promise<BackendHealth[]> {
  return Promise.all(
    departments.backends().map(async ({ role, backend }) => {
      const url = buildTargetUrl(backend.url, backend.healthPath);
      try {
        const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs), redirect: 'manual' });
        // Body is not needed; release the connection
        await response.body?.cancel();
        return { role, url, healthy: response.status === 200 };
      } catch (error) {
        console.warn(`[Readiness] ${role} backend ${url} unreachable: ${errorMessage(error)}`);
        return { role, url, healthy: false };
      }
    })
  );
}

export async function isReady(departments: DepartmentMap, timeoutMs: number): Promise<boolean> {
  const results = await probeBackends(departments, timeoutMs);
  return results.some((result) => result.healthy);
}
