import type { SourceSpan } from "./token.js";
import type { Value } from "./value.js";

export interface Property {
  name: string;
  value: Value;
  span: SourceSpan;
}

export interface VariableBinding {
  name: string;
  value: Value;
  span: SourceSpan;
}

export interface ImportDecl {
  path: string;
  span: SourceSpan;
}

export interface LayoutNode {
  widget: string;
  classes: string[];
  properties: Map<string, Property>;
  /** Bindings declared directly in this node's block. */
  variables: VariableBinding[];
  children: LayoutNode[];
  /** Set by `output;` inside a widget definition: the node that receives the widget's children. */
  output: boolean;
  span: SourceSpan;
}

/** `def <name> { var ...; layout <widget> { ... } }` */
export interface WidgetDefinition {
  name: string;
  /** Default parameter values; properties set where the widget is used override them. */
  variables: VariableBinding[];
  layout: LayoutNode;
  span: SourceSpan;
}

export const WILDCARD = "*";

export interface SelectorPart {
  widget: string; // widget name, or "*"
  whitelist: string[];
  blacklist: string[];
}

export interface Selector {
  /** Outermost part first; the last part targets the styled node itself. */
  hierarchy: SelectorPart[];
}

export interface StyleRule {
  selector: Selector;
  properties: Map<string, Property>;
  span: SourceSpan;
}

export interface SourceFile {
  imports: ImportDecl[];
  variables: VariableBinding[];
  styles: StyleRule[];
  layouts: LayoutNode[];
  widgets: WidgetDefinition[];
}
