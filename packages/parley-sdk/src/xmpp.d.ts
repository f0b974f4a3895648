declare module '@xmpp/client' {
  export interface Element {
    name: string
    attrs: Record<string, string>
    children: (string | Element)[]
    is(name: string, xmlns?: string): boolean
    getChild(name: string, xmlns?: string): Element | undefined
    getChildren(name: string, xmlns?: string): Element[]
    getChildText(name: string): string | null
    getText(): string
    text(): string
    toString(): string
  }

  export function xml(name: string, attrs?: Record<string, string>, ...children: (Element | string)[]): Element
}
