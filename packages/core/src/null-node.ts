/**
 * Hierarchical-node capability set (W3C DOM Node parity) and its null object.
 *
 * Attributes are readonly; the three writable DOM attributes are exposed as
 * setter methods so a frozen null object can accept them as no-ops.
 */

export interface NodeListLike {
  readonly length: number
  item(index: number): DocumentNode | null
}

export interface NamedNodeMapLike {
  readonly length: number
  item(index: number): DocumentNode | null
  getNamedItem(name: string): DocumentNode | null
}

export type UserDataHandler = (
  operation: number,
  key: string,
  data: unknown,
  src: DocumentNode | null,
  dst: DocumentNode | null,
) => void

export interface DocumentNode {
  readonly nodeName: string
  readonly nodeValue: string | null
  readonly nodeType: number
  readonly parentNode: DocumentNode | null
  readonly childNodes: NodeListLike
  readonly firstChild: DocumentNode | null
  readonly lastChild: DocumentNode | null
  readonly previousSibling: DocumentNode | null
  readonly nextSibling: DocumentNode | null
  readonly attributes: NamedNodeMapLike | null
  readonly ownerDocument: DocumentNode | null
  readonly namespaceURI: string | null
  readonly prefix: string | null
  readonly localName: string | null
  readonly baseURI: string | null
  readonly textContent: string | null

  setNodeValue(nodeValue: string | null): void
  setPrefix(prefix: string | null): void
  setTextContent(textContent: string | null): void

  insertBefore(newChild: DocumentNode, refChild: DocumentNode | null): DocumentNode | null
  replaceChild(newChild: DocumentNode, oldChild: DocumentNode): DocumentNode | null
  removeChild(oldChild: DocumentNode): DocumentNode | null
  appendChild(newChild: DocumentNode): DocumentNode | null
  hasChildNodes(): boolean
  cloneNode(deep: boolean): DocumentNode | null
  normalize(): void
  isSupported(feature: string, version: string): boolean
  hasAttributes(): boolean
  compareDocumentPosition(other: DocumentNode): number
  isSameNode(other: DocumentNode | null): boolean
  lookupPrefix(namespaceURI: string | null): string | null
  isDefaultNamespace(namespaceURI: string | null): boolean
  lookupNamespaceURI(prefix: string | null): string | null
  isEqualNode(other: DocumentNode | null): boolean
  getFeature(feature: string, version: string): unknown
  setUserData(key: string, data: unknown, handler: UserDataHandler | null): unknown
  getUserData(key: string): unknown
}

export const EMPTY_NODE_LIST: NodeListLike = Object.freeze({
  length: 0,
  item: () => null,
})

/** The null node: an empty, detached, childless node that ignores every mutation. */
export const NULL_NODE: DocumentNode = Object.freeze({
  nodeName: '',
  nodeValue: null,
  nodeType: 0,
  parentNode: null,
  childNodes: EMPTY_NODE_LIST,
  firstChild: null,
  lastChild: null,
  previousSibling: null,
  nextSibling: null,
  attributes: null,
  ownerDocument: null,
  namespaceURI: null,
  prefix: null,
  localName: null,
  baseURI: null,
  textContent: null,

  setNodeValue: () => {},
  setPrefix: () => {},
  setTextContent: () => {},

  insertBefore: () => null,
  replaceChild: () => null,
  removeChild: () => null,
  appendChild: () => null,
  hasChildNodes: () => false,
  cloneNode: () => null,
  normalize: () => {},
  isSupported: () => false,
  hasAttributes: () => false,
  compareDocumentPosition: () => 0,
  isSameNode: () => false,
  lookupPrefix: () => null,
  isDefaultNamespace: () => false,
  lookupNamespaceURI: () => null,
  isEqualNode: () => false,
  getFeature: () => null,
  setUserData: () => null,
  getUserData: () => null,
})
