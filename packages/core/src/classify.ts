import { JobFields, TerminalStatus } from "./types/Job";
import { ExecutionOutcome } from "./types/Outcome";

export interface ClassifyOptions {
    /** Strings a scraper returns in place of data, e.g. when access is denied. */
    sentinels?: readonly string[];
    /** Object keys that identify the target rather than carry results. */
    identityKeys?: readonly string[];
}

export const DEFAULT_SENTINELS: readonly string[] = ['No-access', 'No-reviews', 'No-statistics'];
export const DEFAULT_IDENTITY_KEYS: readonly string[] = ['target_id'];

export const EMPTY_RESULT_NOTE = 'Execution returned an empty result.';

export type TerminalFields = JobFields & { status: TerminalStatus; completedAt: string };

/**
 * True when a payload carries no data: nothing, an empty or sentinel string,
 * or a collection whose members are all degenerate.
 */
export function isDegeneratePayload(payload: unknown, options: ClassifyOptions = {}): boolean {
    const sentinels = options.sentinels ?? DEFAULT_SENTINELS;
    const identityKeys = options.identityKeys ?? DEFAULT_IDENTITY_KEYS;

    if (payload === null || payload === undefined) return true;

    if (typeof payload === 'string') {
        const value = payload.trim();
        return value === '' || sentinels.includes(value);
    }

    if (Array.isArray(payload)) {
        return payload.every((item) => isDegeneratePayload(item, options));
    }

    if (typeof payload === 'object') {
        return Object.entries(payload)
            .filter(([key]) => !identityKeys.includes(key))
            .every(([, value]) => isDegeneratePayload(value, options));
    }

    return false;
}

function serializePayload(payload: unknown): string {
    return JSON.stringify(payload ?? null);
}

export function toTerminalFields(outcome: ExecutionOutcome, completedAt: string, options: ClassifyOptions = {}): TerminalFields {
    switch (outcome.status) {
        case 'success':
            if (isDegeneratePayload(outcome.payload, options)) {
                return {
                    status: 'warning',
                    completedAt,
                    resultData: serializePayload(outcome.payload),
                    warningMessage: EMPTY_RESULT_NOTE,
                };
            }
            return {
                status: 'completed',
                completedAt,
                resultData: serializePayload(outcome.payload),
                errorMessage: '',
            };

        case 'warning':
            return {
                status: 'warning',
                completedAt,
                resultData: serializePayload(outcome.payload),
                warningMessage: outcome.note || EMPTY_RESULT_NOTE,
            };

        case 'failed':
            return {
                status: 'failed',
                completedAt,
                errorMessage: outcome.error || 'Job failed without an error message.',
            };

        case 'captcha_required':
            return {
                status: 'failed',
                completedAt,
                errorMessage: `CAPTCHA challenge encountered: ${outcome.challengeUrl}`,
                challengeUrl: outcome.challengeUrl,
            };
    }
}
