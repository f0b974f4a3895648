/**
 * Qualified names: the (namespace, local name) pair that identifies an
 * element independently of the prefix used on the wire.
 *
 * @module Core/QName
 */

export interface QualifiedName {
  /** Resolved namespace URI, '' when the element is in no namespace */
  space: string
  local: string
}

export function qname(space: string, local: string): QualifiedName {
  return { space, local }
}

export function sameName(a: QualifiedName, b: QualifiedName): boolean {
  return a.space === b.space && a.local === b.local
}

/** Clark notation, for log and error messages only. */
export function formatName(name: QualifiedName): string {
  return name.space ? `{${name.space}}${name.local}` : name.local
}

/**
 * Map keyed by qualified name.
 *
 * Entries live in a two-level map (namespace, then local name) so that no
 * separator character can make two distinct names collide.
 */
export class QNameMap<V> {
  private readonly spaces = new Map<string, Map<string, V>>()

  set(name: QualifiedName, value: V): this {
    let locals = this.spaces.get(name.space)
    if (!locals) {
      locals = new Map()
      this.spaces.set(name.space, locals)
    }
    locals.set(name.local, value)
    return this
  }

  get(name: QualifiedName): V | undefined {
    return this.spaces.get(name.space)?.get(name.local)
  }

  has(name: QualifiedName): boolean {
    return this.spaces.get(name.space)?.has(name.local) ?? false
  }

  get size(): number {
    let total = 0
    for (const locals of this.spaces.values()) total += locals.size
    return total
  }
}
