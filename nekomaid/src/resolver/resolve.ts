import type { LayoutNode, Property, SelectorPart, SourceFile, StyleRule, WidgetDefinition } from "../types/ast.js";
import type { Document, DocumentNode, ResolvedStyleRule, StyleGuide } from "../types/document.js";
import type { SourceSpan } from "../types/token.js";
import type { ResolvedValue } from "../types/value.js";
import { ResolutionError } from "../types/errors.js";
import { cascade } from "../stylesheet/cascade.js";
import type { PathEntry } from "../stylesheet/selector.js";
import { deepFreeze } from "../document/freeze.js";
import { Scope } from "./scope.js";

export interface ResolveOptions {
  /** Style guides that `import "<name>";` may refer to. */
  styleGuides?: ReadonlyMap<string, StyleGuide>;
  /** When given, every native layout must name one of these widgets. */
  widgets?: Iterable<string>;
}

/** A child written inside a custom widget's block, with the context it was written in. */
interface SlotChild {
  node: LayoutNode;
  scope: Scope;
  expansion: Expansion | undefined;
}

/** One use of a custom widget being expanded into its definition's layout. */
interface Expansion {
  definition: WidgetDefinition;
  slot: SlotChild[];
}

/**
 * Turns a parsed file into a frozen Document: imports are looked up,
 * variables substituted, custom widgets expanded and every node's effective
 * properties computed. The file itself is never modified, so resolving it
 * again (for instance against edited style guides) is safe.
 */
export function resolve(file: SourceFile, options: ResolveOptions = {}): Document {
  const guides = options.styleGuides ?? new Map<string, StyleGuide>();
  const widgets = options.widgets !== undefined ? new Set(options.widgets) : undefined;
  const definitions = new Map(
    file.widgets.map((definition): [string, WidgetDefinition] => [definition.name, definition]),
  );

  const imported: StyleGuide[] = [];
  for (const decl of file.imports) {
    const guide = guides.get(decl.path);
    if (guide === undefined) {
      throw new ResolutionError(
        "undefined-style",
        decl.path,
        `Style guide '${decl.path}' is not defined`,
        decl.span,
      );
    }
    imported.push(guide);
  }

  // Imported variables form the outermost frame; later imports shadow earlier ones.
  const importedValues = new Map<string, ResolvedValue>();
  for (const guide of imported) {
    for (const [name, value] of guide.variables) {
      importedValues.set(name, value);
    }
  }
  const root = Scope.root(importedValues).child(file.variables);
  const variables = root.ownValues();

  for (const definition of file.widgets) {
    checkLayout(definition.layout, definition);
  }

  const rules: ResolvedStyleRule[] = [
    ...imported.flatMap((guide) => guide.rules),
    ...file.styles.map((rule) => resolveRule(rule)),
  ];

  const roots = file.layouts.map((layout) => resolveNode(layout, root, [], undefined, []));

  return deepFreeze({
    roots,
    variables,
    styles: rules,
    imports: file.imports.map((decl) => decl.path),
  });

  /**
   * The definition `widget` refers to at `span`, if any. A definition is not
   * visible inside its own layout, where the name means the native widget.
   */
  function findDefinition(widget: string, span: SourceSpan, within?: WidgetDefinition): WidgetDefinition | undefined {
    const definition = definitions.get(widget);
    if (definition === undefined || definition === within) return undefined;
    if (definition.span.offset > span.offset) {
      throw new ResolutionError("unknown-widget", widget, `Widget '${widget}' is used before its definition`, span);
    }
    return definition;
  }

  function checkWidget(node: LayoutNode): void {
    if (widgets !== undefined && !widgets.has(node.widget)) {
      throw new ResolutionError("unknown-widget", node.widget, `Unknown widget '${node.widget}'`, node.span);
    }
  }

  // Definitions are checked even when nothing uses them.
  function checkLayout(node: LayoutNode, within: WidgetDefinition): void {
    if (findDefinition(node.widget, node.span, within) === undefined) {
      checkWidget(node);
    }
    for (const child of node.children) {
      checkLayout(child, within);
    }
  }

  function resolveNode(
    node: LayoutNode,
    parent: Scope,
    parentPath: ReadonlyArray<PathEntry>,
    expansion: Expansion | undefined,
    extraClasses: ReadonlyArray<string>,
  ): DocumentNode {
    const definition = findDefinition(node.widget, node.span, expansion?.definition);
    if (definition === undefined) {
      checkWidget(node);
    }

    const scope = parent.child(node.variables);
    const explicit = resolveProperties(node.properties, scope);
    const classes = mergeClasses(node.classes, extraClasses);

    if (definition !== undefined) {
      // Properties set on a custom widget are parameters of its layout.
      const parameters = root.child(definition.variables).withValues(explicit);
      const slot = node.children.map((child): SlotChild => ({ node: child, scope, expansion }));
      if (node.output && expansion !== undefined) {
        slot.push(...expansion.slot);
      }
      return resolveNode(definition.layout, parameters, parentPath, { definition, slot }, classes);
    }

    const path = [...parentPath, { widget: node.widget, classes }];
    const children = node.children.map((child) => resolveNode(child, scope, path, expansion, []));
    if (node.output && expansion !== undefined) {
      for (const child of expansion.slot) {
        children.push(resolveNode(child.node, child.scope, path, child.expansion, []));
      }
    }

    return {
      widget: node.widget,
      classes,
      properties: cascade(path, rules, explicit),
      children,
      span: { ...node.span },
    };
  }

  function resolveRule(rule: StyleRule): ResolvedStyleRule {
    return {
      selector: {
        hierarchy: rule.selector.hierarchy.flatMap((part) => unrollPart(part, rule.span)),
      },
      properties: resolveProperties(rule.properties, root),
      origin: undefined,
    };
  }

  /**
   * A selector part naming a custom widget stands for the native nodes from
   * its layout's root down to the output node. The part's own classes apply
   * to the root.
   */
  function unrollPart(part: SelectorPart, span: SourceSpan, within?: WidgetDefinition): SelectorPart[] {
    const definition = findDefinition(part.widget, span, within);
    if (definition === undefined) {
      return [{ widget: part.widget, whitelist: [...part.whitelist], blacklist: [...part.blacklist] }];
    }

    const parts = outputChain(definition.layout).flatMap((node) =>
      unrollPart({ widget: node.widget, whitelist: node.classes, blacklist: [] }, node.span, definition),
    );
    const [first, ...rest] = parts;
    if (first === undefined) return parts;
    return [
      {
        widget: first.widget,
        whitelist: mergeClasses(first.whitelist, part.whitelist),
        blacklist: mergeClasses(first.blacklist, part.blacklist),
      },
      ...rest,
    ];
  }
}

function resolveProperties(properties: ReadonlyMap<string, Property>, scope: Scope): Map<string, ResolvedValue> {
  const resolved = new Map<string, ResolvedValue>();
  for (const [name, property] of properties) {
    resolved.set(name, scope.resolveValue(property.value));
  }
  return resolved;
}

/** Nodes from `node` down to the output node; just `node` when there is none. */
function outputChain(node: LayoutNode): LayoutNode[] {
  if (node.output) return [node];
  for (const child of node.children) {
    const chain = outputChain(child);
    if (chain[chain.length - 1]?.output === true) return [node, ...chain];
  }
  return [node];
}

function mergeClasses(classes: ReadonlyArray<string>, extra: ReadonlyArray<string>): string[] {
  return [...classes, ...extra.filter((name) => !classes.includes(name))];
}

/**
 * Packages a resolved document as a style guide that other files can
 * import. Rules the document itself declared are tagged with `name`.
 */
export function styleGuideFromDocument(name: string, document: Document): StyleGuide {
  return deepFreeze({
    name,
    rules: document.styles.map((rule) => ({ ...rule, origin: rule.origin ?? name })),
    variables: new Map(document.variables),
  });
}
