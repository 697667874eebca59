// src/types/renderable.ts

export type ContainerStyle = 'bracketed' | 'tree';

/** Host objects that know their own hierarchical name, e.g. "Workspace.Lobby.Door". */
export interface HasQualifiedName {
  getFullName(): string;
}

export type MappingEntry = readonly [key: unknown, value: unknown];

export type RenderableValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number | bigint }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'mapping'; entries: MappingEntry[]; source: object }
  | { kind: 'qualified'; target: HasQualifiedName }
  | { kind: 'other'; typeName: string };

export type RenderOptions = {
  containerStyle: ContainerStyle;
  /** Spaces per nesting level in bracketed blocks. */
  tabWidth: number;
  /** Prepended to qualified names (e.g. "game."). */
  qualifiedNamePrefix: string;
};

export type RenderContext = RenderOptions & {
  /** Nesting level of the mapping being rendered (0 at the top). */
  depth: number;
  /** Connector prefix carried down tree-style recursion. */
  indent: string;
  /** Mappings on the current rendering path. */
  seen: ReadonlySet<object>;
};

export type RenderFn = (value: unknown, ctx: RenderContext) => string;
