/**
 * Small DOM helpers over @xmldom/xmldom documents.
 *
 * xmldom nodes expose `childNodes` but not `children`, so element
 * traversal goes through these functions.
 */

const ELEMENT_NODE = 1;

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export function childElements(parent: Node, localName?: string): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (isElement(node) && (localName === undefined || node.localName === localName)) {
      result.push(node);
    }
  }
  return result;
}

export function firstChildElement(parent: Node, localName: string): Element | undefined {
  return childElements(parent, localName)[0];
}

/**
 * All descendant elements in document order, optionally filtered by local name.
 */
export function descendantElements(parent: Node, localName?: string): Element[] {
  const result: Element[] = [];
  const visit = (node: Node): void => {
    for (const child of childElements(node)) {
      if (localName === undefined || child.localName === localName) {
        result.push(child);
      }
      visit(child);
    }
  };
  visit(parent);
  return result;
}

export function removeElement(element: Element): void {
  element.parentNode?.removeChild(element);
}

/**
 * Create `localName` in the parent's namespace and insert it before the
 * first existing child named in `before`, or append it.
 */
export function insertChildElement(parent: Element, localName: string, before: string[] = []): Element {
  const document = parent.ownerDocument;
  const child = document.createElementNS(parent.namespaceURI, localName);
  const anchor = childElements(parent).find((element) => before.includes(element.localName));
  if (anchor) {
    parent.insertBefore(child, anchor);
  } else {
    parent.appendChild(child);
  }
  return child;
}

/**
 * Attribute value, or undefined when the attribute is absent or empty.
 * xmldom returns '' rather than null for a missing attribute.
 */
export function attributeValue(element: Element, name: string): string | undefined {
  const value = element.hasAttribute(name) ? element.getAttribute(name) : null;
  return value ? value : undefined;
}

/**
 * Put `ordered` into the slots currently taken by `slots`, keeping the
 * whitespace and other nodes around them in place.
 */
export function reorderElements(slots: Element[], ordered: Element[]): void {
  const markers = slots.map((slot) => {
    const marker = slot.ownerDocument.createTextNode('');
    slot.parentNode?.insertBefore(marker, slot);
    return marker;
  });
  slots.forEach(removeElement);
  markers.forEach((marker, i) => {
    marker.parentNode?.insertBefore(ordered[i], marker);
    marker.parentNode?.removeChild(marker);
  });
}

export function elementText(element: Element | undefined): string | undefined {
  if (!element) {
    return undefined;
  }
  return element.textContent ?? undefined;
}

export function setElementText(element: Element, text: string): void {
  while (element.firstChild) {
    element.removeChild(element.firstChild);
  }
  element.appendChild(element.ownerDocument.createTextNode(text));
}
