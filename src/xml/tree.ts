/**
 * In-memory XML tree used while a deposit document is being assembled.
 */

/** A node of the output tree. */
export type XmlNode =
  | { type: "element"; name: string; attributes: Record<string, string>; children: XmlNode[] }
  | { type: "text"; text: string }
  | { type: "comment"; text: string };

export type XmlElement = Extract<XmlNode, { type: "element" }>;

/** Create a detached element. */
export function createElement(name: string, attributes: Record<string, string> = {}): XmlElement {
  return { type: "element", name, attributes: { ...attributes }, children: [] };
}

/**
 * Append a new child element to `parent` and return it.
 * When `text` is given it becomes the element's only child.
 */
export function subElement(
  parent: XmlElement,
  name: string,
  attributes: Record<string, string> = {},
  text?: string
): XmlElement {
  const child = createElement(name, attributes);
  if (text !== undefined) appendText(child, text);
  parent.children.push(child);
  return child;
}

/** Append an existing node and return it. */
export function appendChild<T extends XmlNode>(parent: XmlElement, child: T): T {
  parent.children.push(child);
  return child;
}

/** Append a text node. Empty strings add nothing. */
export function appendText(parent: XmlElement, text: string): void {
  if (text) parent.children.push({ type: "text", text });
}

export function appendComment(parent: XmlElement, text: string): void {
  parent.children.push({ type: "comment", text });
}

/** Find the first child element with the given name. */
export function findChild(parent: XmlElement, name: string): XmlElement | undefined {
  for (const child of parent.children) {
    if (child.type === "element" && child.name === name) return child;
  }
  return undefined;
}

/** Find all child elements with the given name. */
export function findChildren(parent: XmlElement, name: string): XmlElement[] {
  return parent.children.filter(
    (child): child is XmlElement => child.type === "element" && child.name === name
  );
}

/** Concatenated text of an element and its descendants. */
export function textContent(node: XmlNode): string {
  switch (node.type) {
    case "text":
      return node.text;
    case "comment":
      return "";
    case "element":
      return node.children.map(textContent).join("");
  }
}
