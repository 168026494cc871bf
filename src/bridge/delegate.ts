import { dispatch, type Executor } from '../executor/index.js'

/** String keys of `T` whose values are callable. */
export type MethodKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never
}[keyof T] &
  string

/** Same parameters as the wrapped methods, each returning a promise of the result. */
export type Dispatched<T, K extends MethodKeys<T>> = {
  [P in K]: T[P] extends (...args: infer A) => infer R ? (...args: A) => Promise<Awaited<R>> : never
}

/** Read-only view of the listed properties of `T`. */
export type Passthrough<T, K extends keyof T> = {
  readonly [P in K]: T[P]
}

/** Instances that carry the executor forwarded calls are dispatched on. */
export interface DelegationOwner {
  readonly executor: Executor
}

function assertField(prototype: object, field: string): void {
  if (!(field in prototype)) {
    throw new TypeError(`Cannot delegate through "${field}": no such member on the owner prototype`)
  }
}

function assertFree(prototype: object, name: string): void {
  if (Object.hasOwn(prototype, name)) {
    throw new TypeError(`Cannot generate "${name}": the owner already defines it`)
  }
}

function readTarget(owner: object, field: string): object {
  const target: unknown = Reflect.get(owner, field)
  if (typeof target !== 'object' || target === null) {
    throw new TypeError(`"${field}" does not hold an object`)
  }
  return target
}

/**
 * Install dispatched forwarding methods on `owner.prototype`.
 *
 * For every name, `instance.name(...args)` reads `instance[field]`
 * synchronously, binds the call and submits it to `instance.executor`. The
 * promise is returned without being awaited. Runs once per class, at module
 * load; a missing `field` or a clashing name throws right away.
 *
 * @param owner - Class whose prototype receives the methods
 * @param field - Accessor on the prototype that yields the wrapped object
 * @param methods - Method names of the wrapped object to forward
 */
export function delegateToExecutor<Target>(
  owner: { prototype: DelegationOwner },
  field: string,
  methods: readonly MethodKeys<Target>[],
): void {
  const prototype = owner.prototype
  assertField(prototype, field)
  if (methods.length === 0) {
    throw new TypeError('delegateToExecutor needs at least one method name')
  }

  for (const name of methods) {
    assertFree(prototype, name)
    Object.defineProperty(prototype, name, {
      configurable: true,
      enumerable: false,
      writable: true,
      value: function forward(this: DelegationOwner, ...args: unknown[]): Promise<unknown> {
        const target = readTarget(this, field)
        const method: unknown = Reflect.get(target, name)
        if (typeof method !== 'function') {
          throw new TypeError(`"${field}.${name}" is not a function`)
        }
        return dispatch<unknown>(this.executor, () => Reflect.apply(method, target, args))
      },
    })
  }
}

/**
 * Install read-through getters on `owner.prototype`.
 *
 * `instance.name` returns `instance[field].name` in the caller's context, no
 * dispatch. Meant for in-process state that costs nothing to read.
 */
export function proxyPropertyDirectly<Target>(
  owner: { prototype: object },
  field: string,
  properties: readonly (keyof Target & string)[],
): void {
  const prototype = owner.prototype
  assertField(prototype, field)

  for (const name of properties) {
    assertFree(prototype, name)
    Object.defineProperty(prototype, name, {
      configurable: true,
      enumerable: false,
      get(this: object): unknown {
        return Reflect.get(readTarget(this, field), name)
      },
    })
  }
}
