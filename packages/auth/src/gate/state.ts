/**
 * Per-instance gate state and raw field access.
 *
 * Gated instances are proxies. The session and the error messages need the
 * fields behind the proxy without triggering a check, so every helper here
 * works on the proxy's target.
 */

/**
 * What the gate needs to know about the session an instance belongs to.
 */
export interface UnitOfWork {
  /** A transaction is open */
  readonly isActive: boolean
  /** The instance is pending or persistent in this unit of work */
  contains(instance: object): boolean
}

/**
 * Back reference from a loaded instance to its session.
 */
export interface SessionBinding {
  readonly context: { readonly badge: unknown }
  readonly unitOfWork: UnitOfWork
}

/**
 * Instance side of a gate-able entity.
 */
export interface Gated {
  blockedReadAttributes(badge: unknown): Iterable<string>
  blockedWriteAttributes(badge: unknown): Iterable<string>
}

export interface GateState {
  readonly target: object
  readonly proxy: Gated
  binding: SessionBinding | undefined
  /** Set while the blocked sets are being computed; checks are skipped */
  checking: boolean
}

const statesByProxy = new WeakMap<object, GateState>()

export function registerGate(state: GateState): void {
  statesByProxy.set(state.proxy, state)
}

export function gateStateOf(instance: object): GateState | undefined {
  return statesByProxy.get(instance)
}

/**
 * The object behind a gated instance, or the instance itself.
 */
export function rawTarget(instance: object): object {
  return statesByProxy.get(instance)?.target ?? instance
}

export function readRaw(instance: object, field: string): unknown {
  return Reflect.get(rawTarget(instance), field)
}

export function writeRaw(instance: object, field: string, value: unknown): void {
  Reflect.set(rawTarget(instance), field, value)
}

/**
 * Own enumerable fields that are not `_`-prefixed and do not hold functions.
 */
export function publicFields(instance: object): string[] {
  const target = rawTarget(instance)
  return Object.keys(target).filter(field => !field.startsWith('_') && typeof Reflect.get(target, field) !== 'function')
}

export function bindInstance(instance: object, binding: SessionBinding): void {
  const state = statesByProxy.get(instance)
  if (state) {
    state.binding = binding
  }
}

export function unbindInstance(instance: object): void {
  const state = statesByProxy.get(instance)
  if (state) {
    state.binding = undefined
  }
}

export function bindingOf(instance: object): SessionBinding | undefined {
  return statesByProxy.get(instance)?.binding
}
