import { jsonResponse } from '../message/response';
import type { Router } from './router';

export type IndexDepth = 'shallow' | 'full';

/**
 * Read the `depth` query parameter, ignoring case. Anything but "shallow" means the full document.
 */
export function parseIndexDepth(value: string | undefined): IndexDepth {
  return value?.toLowerCase() === 'shallow' ? 'shallow' : 'full';
}

/**
 * Register the self-description document at "/" of `router`.
 */
export function registerIndexEndpoint(router: Router): void {
  router.register(
    '/',
    {
      description: 'List every endpoint and mounted router',
      parameters: [
        {
          name: 'depth',
          description: 'shallow lists mounted routers as summaries; full expands them',
          defaultValue: 'full',
          examples: ['shallow', 'full'],
        },
      ],
      runsOnMainThread: false,
    },
    (request) => jsonResponse(router.routerInfo(parseIndexDepth(request.queryParams.depth) === 'full'))
  );
}
