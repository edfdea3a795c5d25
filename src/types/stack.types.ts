import type { CheckStatusEnumType } from './enums.js';

export type CheckStatus = CheckStatusEnumType;

/**
 * One stack doctor check
 */
export interface StackCheck {
    name: string;
    status: CheckStatus;
    message: string;
    /** Changes applied in fix mode */
    actions?: string[];
}

export interface StackReport {
    checks: StackCheck[];
    /** True when no check failed */
    healthy: boolean;
    fix: boolean;
}

export interface InspectOptions {
    /** Install, deploy and create what is missing */
    fix?: boolean;
    /** Delete and recreate the index (fix mode only) */
    recreateIndex?: boolean;
    /** Skip the relational store check */
    skipDatabase?: boolean;
}
