/**
 * Best-effort work that runs after a transaction has committed. A failure
 * here never fails the operation: it is logged and raised as a monitoring
 * alert so the write can be reconciled later.
 */

import type {SideEffectFailureAlert, SideEffectName} from '../types';
import type {MonitoringService} from './effects';
import {EffectsError, toError} from '../effects/EffectsError';
import {Either, EitherAsync} from 'purify-ts';

export type BestEffortTask = {
    readonly name: SideEffectName;
    readonly run: () => Promise<unknown>;
};

export type SideEffectContext = {
    readonly userId: number;
    readonly orderId: number;
};

export function buildFailureAlerts(
    failures: readonly { name: SideEffectName; error: Error }[],
    context: SideEffectContext
): SideEffectFailureAlert[] {
    return failures.map(failure => ({
        type: 'side_effect_failed',
        sideEffect: failure.name,
        userId: context.userId,
        orderId: context.orderId,
        detail: failure.error.message,
    }));
}

/**
 * Runs every task, then reports the failures. Resolves with the alerts that
 * were raised (empty when everything succeeded).
 */
export async function runBestEffort(
    tasks: readonly BestEffortTask[],
    context: SideEffectContext,
    monitoring: MonitoringService
): Promise<SideEffectFailureAlert[]> {
    const results = await Promise.all(tasks.map(async task => ({
        name: task.name,
        outcome: await EitherAsync(task.run).run(),
    })));

    const failures = results.flatMap(({name, outcome}) =>
        Either.lefts([outcome]).map(error => ({name, error: toError(error)}))
    );
    if (failures.length === 0) return [];

    const aggregate = new EffectsError(failures.map(failure => failure.error));
    console.error(`❌ Side effects failed for order ${context.orderId}:`, aggregate.message);

    const alerts = buildFailureAlerts(failures, context);
    try {
        await monitoring.sendAlerts(alerts);
    } catch (error) {
        console.warn(`⚠️  Could not deliver ${alerts.length} side effect alert(s):`, toError(error).message);
    }
    return alerts;
}
