import type { Request } from '../message/request';
import type { Response } from '../message/response';

/**
 * An endpoint handler. May answer synchronously or with a promise.
 */
export type RouteHandler = (request: Request) => Response | Promise<Response>;

/**
 * Describes a query parameter for API discovery. Never validated against requests.
 */
export interface ParameterInfo {
  name: string;
  description: string;
  required: boolean;
  defaultValue?: string;
  examples: string[];
}

/**
 * Input form of ParameterInfo; `required` and `examples` may be omitted.
 */
export type ParameterInfoInit = Omit<ParameterInfo, 'required' | 'examples'> & {
  required?: boolean;
  examples?: string[];
};

export interface RouteOptions {
  description?: string;
  parameters?: ParameterInfoInit[];
  /** Run on the affinity context (default: true) */
  runsOnMainThread?: boolean;
}

export interface EndpointEntry {
  readonly kind: 'endpoint';
  readonly path: string;
  readonly description: string;
  readonly parameters: readonly ParameterInfo[];
  readonly runsOnMainThread: boolean;
  readonly handler: RouteHandler;
}

export interface MountEntry<TRouter> {
  readonly kind: 'mount';
  readonly path: string;
  readonly router: TRouter;
}

export type RouteEntry<TRouter> = EndpointEntry | MountEntry<TRouter>;

/**
 * One endpoint in the self-description document.
 */
export interface EndpointInfo {
  path: string;
  description: string;
  runsOnMainThread: boolean;
  parameters?: ParameterInfo[];
}

/**
 * A router in the self-description document. Summaries (shallow sub-routers)
 * carry only path, description and endpointCount.
 */
export interface RouterInfo {
  path: string;
  description: string;
  endpointCount: number;
  endpoints?: EndpointInfo[];
  routers?: RouterInfo[];
}

export function toParameterInfo(init: ParameterInfoInit): ParameterInfo {
  return {
    name: init.name,
    description: init.description,
    required: init.required ?? false,
    ...(init.defaultValue !== undefined ? { defaultValue: init.defaultValue } : {}),
    examples: [...(init.examples ?? [])],
  };
}
