/**
 * Attribute gate
 *
 * Wraps an instance in a proxy whose get, set and delete traps consult the
 * instance's blocked sets for the badge of the session it was loaded into.
 *
 * @module @badgegate/auth/gate
 */

import { describeBadge, isAllow, isDeny } from '../badge.js'
import { BlockedAttributeError, type AttributeAccess } from '../errors.js'
import { gateStateOf, publicFields, registerGate, type GateState, type Gated } from './state.js'

type Decision = { readonly bypass: true } | { readonly bypass: false; readonly badge: unknown }

const BYPASS: Decision = { bypass: true }

function decide(state: GateState): Decision {
  const binding = state.binding
  if (!binding || !binding.unitOfWork.isActive || !binding.unitOfWork.contains(state.proxy)) {
    return BYPASS
  }
  const badge = binding.context.badge
  return isAllow(badge) ? BYPASS : { bypass: false, badge }
}

function computeBlocked(state: GateState, access: AttributeAccess, badge: unknown): Set<string> {
  if (isDeny(badge)) {
    return new Set(publicFields(state.target))
  }

  const previous = state.checking
  state.checking = true
  try {
    const blocked =
      access === 'read' ? state.proxy.blockedReadAttributes(badge) : state.proxy.blockedWriteAttributes(badge)
    return new Set(blocked)
  } finally {
    state.checking = previous
  }
}

function describeTarget(target: object): string {
  const ctor: unknown = target.constructor
  const className = typeof ctor === 'function' && ctor.name ? ctor.name : 'Object'
  const table =
    typeof ctor === 'function' && 'tableName' in ctor && typeof ctor.tableName === 'string' ? ctor.tableName : undefined
  const primaryKey =
    typeof ctor === 'function' && 'primaryKey' in ctor && typeof ctor.primaryKey === 'string' ? ctor.primaryKey : 'id'
  const id: unknown = Reflect.get(target, primaryKey)
  const label = table ? `${className}(${table})` : className
  return id === undefined || id === null ? label : `${label}#${String(id)}`
}

function guard(state: GateState, access: AttributeAccess, attribute: string): void {
  if (state.checking) {
    return
  }
  const decision = decide(state)
  if (decision.bypass) {
    return
  }
  const blocked = computeBlocked(state, access, decision.badge)
  if (blocked.has(attribute)) {
    throw new BlockedAttributeError(access, attribute, describeBadge(decision.badge), blocked, describeTarget(state.target))
  }
}

/**
 * Blocked set of a gated instance for its current badge; empty when the gate
 * is bypassed or the instance is not gated.
 */
export function blockedAttributes(instance: object, access: AttributeAccess): Set<string> {
  const state = gateStateOf(instance)
  if (!state) {
    return new Set()
  }
  const decision = decide(state)
  return decision.bypass ? new Set() : computeBlocked(state, access, decision.badge)
}

/**
 * Put `target` behind a gate. Used by the `BlockBase` constructor.
 */
export function createGate<T extends Gated>(target: T): T {
  const handler: ProxyHandler<T> = {
    get(obj, property, receiver) {
      if (typeof property === 'string') {
        guard(state, 'read', property)
      }
      return Reflect.get(obj, property, receiver)
    },
    set(obj, property, value, receiver) {
      if (typeof property === 'string') {
        guard(state, 'write', property)
      }
      return Reflect.set(obj, property, value, receiver)
    },
    deleteProperty(obj, property) {
      if (typeof property === 'string') {
        guard(state, 'write', property)
      }
      return Reflect.deleteProperty(obj, property)
    }
  }

  const proxy = new Proxy(target, handler)
  const state: GateState = { target, proxy, binding: undefined, checking: false }
  registerGate(state)
  return proxy
}
