export const OUTLET_ACTIONS = ['on', 'off', 'reset'] as const;

export type OutletAction = typeof OUTLET_ACTIONS[number];

export type AuthScheme = 'basic' | 'digest';

/**
 * Fully resolved settings for one invocation.
 */
export interface WattBoxConfig {
    url: string;
    username: string;
    password: string;
    outlet: number;
    action: OutletAction;
    verbose: boolean;
}

export interface CommandResult {
    action: OutletAction;
    outlet: number;
    status: number;
    url: string;
    body: string;
}
