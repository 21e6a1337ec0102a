import { toHex, toPrintableAscii } from './buffer-utils';
import type { CharacteristicRegistry } from './characteristic-registry';
import { computeChallengeResponse } from './challenge-response';
import {
  ALTERNATE_UNLOCK_COMMAND,
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_READ_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
  CLASSIC_CHALLENGE_MIN_LENGTH,
  CLASSIC_CHALLENGE_TIMEOUT_MS,
  CLASSIC_KEEPALIVE_INTERVAL_MS,
  DEFAULT_SECRET_KEY,
  DIRECT_UNLOCK_COMMAND,
  EXTENDED_KEEPALIVE_INTERVAL_MS,
  FIRMWARE_READ_BACKOFF_MS,
  MODIFIED_CHALLENGE_MIN_LENGTH,
  MODIFIED_CHALLENGE_TIMEOUT_MS,
  PRIORITY_SUBSCRIPTION_DELAY_MS,
  RESPONSE_SETTLE_MS,
  type TimingProfile,
  UNLOCK_PAUSE_MS,
  WAKE_UP_ROLES,
} from './constants';
import {
  AbortError,
  AllStrategiesExhaustedError,
  BoardError,
  ChallengeTimeoutError,
  delay,
  FirmwareReadFailureError,
  raceWithAbort,
  type StrategyAttempt,
  withTimeout,
} from './errors';
import { describeError, type Logger } from './logger';
import type { SubscriptionManager } from './subscription-manager';
import * as transport from './transport';
import type { AuthVariant, BoardCharacteristic, BoardModel } from './types';

export type StrategyName =
  | 'directUnlock'
  | 'alternateUnlock'
  | 'wakeUpSweep'
  | 'modifiedChallenge'
  | 'classicChallenge';

/**
 * Ordered unlock strategies per variant. A new board generation is
 * supported by adding a variant and its plan here.
 */
export const STRATEGY_PLANS: Readonly<
  Record<AuthVariant, readonly StrategyName[]>
> = {
  gts: ['directUnlock', 'alternateUnlock', 'wakeUpSweep', 'modifiedChallenge'],
  gt: ['directUnlock', 'alternateUnlock', 'wakeUpSweep', 'modifiedChallenge'],
  classic: ['classicChallenge'],
  unknown: ['classicChallenge'],
};

export interface UnlockCommands {
  direct: Uint8Array;
  alternate: Uint8Array;
}

export interface AuthenticationContext {
  /** Advertised name of the connected board */
  deviceName: string;
  registry: CharacteristicRegistry;
  subscriptions: SubscriptionManager;
  profile: TimingProfile;
  logger: Logger;
  secretKey?: ArrayLike<number>;
  /** Overrides for the newer-board unlock commands */
  unlockCommands?: Partial<UnlockCommands>;
  /**
   * Subscribed first, in order, when a strategy subscribes the board's
   * characteristics
   */
  prioritySubscriptions?: readonly BoardCharacteristic[];
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
  notificationTimeoutMs?: number;
  signal?: AbortSignal;
  /** Called after every strategy with its outcome */
  onAttempt?: (attempt: StrategyAttempt) => void;
}

export interface AuthenticationResult {
  /** Raw firmware revision bytes, reused by heartbeat and keepalive */
  firmware: Uint8Array;
  model: BoardModel;
  variant: AuthVariant;
  /** The strategy that unlocked the board */
  strategy: StrategyName;
  keepaliveIntervalMs: number;
  attempts: StrategyAttempt[];
}

/**
 * Labels a board from its advertised name and firmware text.
 */
export function detectBoardModel(
  name: string,
  firmware: Uint8Array,
): BoardModel {
  const text = `${name} ${toPrintableAscii(firmware)}`.toLowerCase();
  if (text.includes('gt-s') || text.includes('gts')) return 'GT-S';
  if (text.includes('gt')) return 'GT';
  if (text.includes('pint')) return 'Pint';
  if (text.includes('xr')) return 'XR';
  return 'Unknown';
}

export function variantForModel(model: BoardModel): AuthVariant {
  switch (model) {
    case 'GT-S':
      return 'gts';
    case 'GT':
      return 'gt';
    case 'Pint':
    case 'XR':
      return 'classic';
    case 'Unknown':
      return 'unknown';
  }
}

export function keepaliveIntervalFor(variant: AuthVariant): number {
  return variant === 'gt' || variant === 'gts'
    ? EXTENDED_KEEPALIVE_INTERVAL_MS
    : CLASSIC_KEEPALIVE_INTERVAL_MS;
}

/**
 * A sentinel value proves an unlock when it carries any non-zero byte.
 */
export function isSentinelAlive(value: Uint8Array): boolean {
  return value.some((byte) => byte !== 0);
}

const REQUIRED_ROLES = [
  'firmwareRevision',
  'readChannel',
  'writeChannel',
] as const;

type StrategyOutcome = 'unlocked' | 'primed';

interface StrategyContext {
  variant: AuthVariant;
  firmware: Uint8Array;
  registry: CharacteristicRegistry;
  subscriptions: SubscriptionManager;
  logger: Logger;
  secretKey: ArrayLike<number>;
  unlockCommands: UnlockCommands;
  prioritySubscriptions: readonly BoardCharacteristic[];
  readTimeoutMs: number;
  writeTimeoutMs: number;
  notificationTimeoutMs: number;
  signal?: AbortSignal;
  guard<T>(promise: Promise<T>): Promise<T>;
}

interface ChallengeParameters {
  minLength: number;
  timeoutMs: number;
  /** Retry once through the write channel when nothing arrives */
  alternateTrigger: boolean;
}

async function verifySentinel(
  ctx: StrategyContext,
  char: BoardCharacteristic,
  label: string,
): Promise<void> {
  const value = await ctx.guard(
    transport.readWithTimeout(char, ctx.readTimeoutMs),
  );
  if (!isSentinelAlive(value)) {
    throw new Error(`${label} sentinel returned no data`);
  }
}

async function directUnlock(ctx: StrategyContext): Promise<StrategyOutcome> {
  const { writeChannel, batteryPercent } = ctx.registry.requireRoles([
    'writeChannel',
    'batteryPercent',
  ]);
  await ctx.subscriptions.subscribeAll(ctx.registry.notifyCapable(), {
    priority: ctx.prioritySubscriptions,
    delayMs: PRIORITY_SUBSCRIPTION_DELAY_MS,
    signal: ctx.signal,
  });
  await delay(UNLOCK_PAUSE_MS, ctx.signal);
  await ctx.guard(
    transport.writeWithTimeout(
      writeChannel,
      ctx.unlockCommands.direct,
      ctx.writeTimeoutMs,
    ),
  );
  await verifySentinel(ctx, batteryPercent, 'Battery');
  return 'unlocked';
}

async function alternateUnlock(ctx: StrategyContext): Promise<StrategyOutcome> {
  const { writeChannel, pitch } = ctx.registry.requireRoles([
    'writeChannel',
    'pitch',
  ]);
  await ctx.guard(
    transport.writeWithTimeout(
      writeChannel,
      ctx.unlockCommands.alternate,
      ctx.writeTimeoutMs,
    ),
  );
  await delay(UNLOCK_PAUSE_MS, ctx.signal);
  await verifySentinel(ctx, pitch, 'Pitch');
  return 'unlocked';
}

async function wakeUpSweep(ctx: StrategyContext): Promise<StrategyOutcome> {
  for (const role of WAKE_UP_ROLES) {
    const char = ctx.registry.getByRole(role);
    if (!char) continue;
    try {
      await ctx.guard(transport.readWithTimeout(char, ctx.readTimeoutMs));
    } catch (e) {
      if (e instanceof AbortError) throw e;
      ctx.logger.debug?.(
        `[Auth] Wake-up read of ${role} failed:`,
        describeError(e),
      );
    }
  }
  return 'primed';
}

async function runChallenge(
  ctx: StrategyContext,
  params: ChallengeParameters,
): Promise<StrategyOutcome> {
  const { firmwareRevision, readChannel, writeChannel } =
    ctx.registry.requireRoles(REQUIRED_ROLES);
  const received: number[] = [];
  let onFilled: (() => void) | null = null;

  const removeListener = readChannel.onValueChanged((value) => {
    received.push(...value);
    if (received.length >= params.minLength) {
      onFilled?.();
    }
  });

  // Resolves when enough bytes arrived or the window closes, whichever first
  function waitForChallenge(): Promise<void> {
    if (received.length >= params.minLength) return Promise.resolve();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const wait = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, params.timeoutMs);
      onFilled = resolve;
    });
    return ctx.guard(wait).finally(() => {
      clearTimeout(timer);
      onFilled = null;
    });
  }

  let startedHere = false;
  try {
    if (!ctx.subscriptions.isSubscribed(readChannel.uuid)) {
      await ctx.guard(
        withTimeout(
          readChannel.startNotifications(),
          ctx.notificationTimeoutMs,
          'BLE notification setup',
        ),
      );
      startedHere = true;
    }

    await ctx.guard(
      transport.writeWithTimeout(
        firmwareRevision,
        ctx.firmware,
        ctx.writeTimeoutMs,
      ),
    );
    await waitForChallenge();

    if (received.length === 0 && params.alternateTrigger) {
      ctx.logger.debug?.(
        '[Auth] No challenge received, triggering through the write channel',
      );
      await ctx.guard(
        transport.writeWithTimeout(
          writeChannel,
          ctx.firmware,
          ctx.writeTimeoutMs,
        ),
      );
      await waitForChallenge();
    }

    if (received.length === 0) {
      throw new ChallengeTimeoutError(params.timeoutMs);
    }

    const challenge = Uint8Array.from(received);
    ctx.logger.debug?.(
      `[Auth] Challenge received (${challenge.length} bytes): ${toHex(challenge)}`,
    );
    const response = computeChallengeResponse(
      challenge,
      ctx.variant,
      ctx.secretKey,
    );
    await ctx.guard(
      transport.writeWithTimeout(writeChannel, response, ctx.writeTimeoutMs),
    );
    await delay(RESPONSE_SETTLE_MS, ctx.signal);
    return 'unlocked';
  } finally {
    removeListener();
    if (startedHere) {
      try {
        await readChannel.stopNotifications();
      } catch (e) {
        ctx.logger.warn(
          '[Auth] Error stopping challenge notifications:',
          describeError(e),
        );
      }
    }
  }
}

const STRATEGIES: Readonly<
  Record<StrategyName, (ctx: StrategyContext) => Promise<StrategyOutcome>>
> = {
  directUnlock,
  alternateUnlock,
  wakeUpSweep,
  classicChallenge: (ctx) =>
    runChallenge(ctx, {
      minLength: CLASSIC_CHALLENGE_MIN_LENGTH,
      timeoutMs: CLASSIC_CHALLENGE_TIMEOUT_MS,
      alternateTrigger: false,
    }),
  modifiedChallenge: (ctx) =>
    runChallenge(ctx, {
      minLength: MODIFIED_CHALLENGE_MIN_LENGTH,
      timeoutMs: MODIFIED_CHALLENGE_TIMEOUT_MS,
      alternateTrigger: true,
    }),
};

/**
 * Reads the firmware revision, picks the board's strategy plan and runs it
 * until one strategy unlocks the board.
 *
 * @throws CharacteristicsMissingError if the handshake characteristics are absent
 * @throws FirmwareReadFailureError if the firmware revision cannot be read
 * @throws AllStrategiesExhaustedError if no strategy unlocked the board; a
 *   single-strategy plan rethrows its own BoardError instead
 * @throws AbortError if the signal fires
 */
export async function authenticate(
  context: AuthenticationContext,
): Promise<AuthenticationResult> {
  const { registry, logger, signal, profile } = context;
  const { firmwareRevision } = registry.requireRoles(REQUIRED_ROLES);

  let firmware: Uint8Array;
  try {
    firmware = await transport.readWithRetry(firmwareRevision, {
      attempts: profile.firmwareReadAttempts,
      timeoutMs: context.readTimeoutMs ?? BLE_READ_TIMEOUT_MS,
      backoffMs: FIRMWARE_READ_BACKOFF_MS,
      signal,
      logger,
    });
  } catch (e) {
    if (e instanceof AbortError) throw e;
    throw new FirmwareReadFailureError(profile.firmwareReadAttempts, e);
  }

  const model = detectBoardModel(context.deviceName, firmware);
  const variant = variantForModel(model);
  const plan = STRATEGY_PLANS[variant];
  logger.debug?.(
    `[Auth] Model ${model}, variant ${variant}, plan: ${plan.join(', ')}`,
  );

  const strategyContext: StrategyContext = {
    variant,
    firmware,
    registry,
    subscriptions: context.subscriptions,
    logger,
    secretKey: context.secretKey ?? DEFAULT_SECRET_KEY,
    unlockCommands: {
      direct:
        context.unlockCommands?.direct ??
        Uint8Array.from(DIRECT_UNLOCK_COMMAND),
      alternate:
        context.unlockCommands?.alternate ??
        Uint8Array.from(ALTERNATE_UNLOCK_COMMAND),
    },
    prioritySubscriptions: context.prioritySubscriptions ?? [],
    readTimeoutMs: context.readTimeoutMs ?? BLE_READ_TIMEOUT_MS,
    writeTimeoutMs: context.writeTimeoutMs ?? BLE_WRITE_TIMEOUT_MS,
    notificationTimeoutMs:
      context.notificationTimeoutMs ?? BLE_NOTIFICATION_TIMEOUT_MS,
    signal,
    guard: (promise) => (signal ? raceWithAbort(promise, signal) : promise),
  };

  const attempts: StrategyAttempt[] = [];
  const record = (attempt: StrategyAttempt): void => {
    attempts.push(attempt);
    context.onAttempt?.(attempt);
  };

  for (const name of plan) {
    if (signal?.aborted) throw new AbortError();
    try {
      const outcome = await STRATEGIES[name](strategyContext);
      record({ strategy: name, outcome });
      if (outcome === 'unlocked') {
        logger.debug?.(`[Auth] Unlocked with ${name}`);
        return {
          firmware,
          model,
          variant,
          strategy: name,
          keepaliveIntervalMs: keepaliveIntervalFor(variant),
          attempts,
        };
      }
    } catch (e) {
      if (e instanceof AbortError) throw e;
      record({ strategy: name, outcome: 'failed', error: describeError(e) });
      logger.warn(`[Auth] Strategy ${name} failed:`, describeError(e));
      if (plan.length === 1 && e instanceof BoardError) throw e;
    }
  }

  throw new AllStrategiesExhaustedError(attempts);
}
