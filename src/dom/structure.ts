/**
 * anchor-scroll/dom - DOM Structure
 * Container resolution and the scaffold the host renders into
 */

import { LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

export interface DOMStructure {
  root: HTMLElement;
  viewport: HTMLElement;
  items: HTMLElement;
}

// =============================================================================
// Container Resolution
// =============================================================================

export const resolveContainer = (container: HTMLElement | string): HTMLElement => {
  if (typeof container === "string") {
    const el = document.querySelector<HTMLElement>(container);
    if (!el) throw new Error(`${LOG_PREFIX} Container not found: ${container}`);
    return el;
  }
  return container;
};

// =============================================================================
// DOM Structure Factory
// =============================================================================

/**
 * Build `root > viewport > items`. The viewport clips; the items layer is
 * translated by the host and every item inside it is absolutely positioned.
 */
export const createDOMStructure = (
  container: HTMLElement,
  classPrefix: string,
  ariaLabel?: string,
): DOMStructure => {
  const root = document.createElement("div");
  root.className = classPrefix;
  root.setAttribute("role", "list");
  root.setAttribute("tabindex", "0");
  root.setAttribute("aria-orientation", "vertical");
  if (ariaLabel) root.setAttribute("aria-label", ariaLabel);

  const viewport = document.createElement("div");
  viewport.className = `${classPrefix}-viewport`;
  viewport.style.overflow = "hidden";
  viewport.style.position = "relative";
  viewport.style.height = "100%";
  viewport.style.width = "100%";

  const items = document.createElement("div");
  items.className = `${classPrefix}-items`;
  items.style.position = "relative";
  items.style.width = "100%";

  viewport.appendChild(items);
  root.appendChild(viewport);
  container.appendChild(root);

  return { root, viewport, items };
};
