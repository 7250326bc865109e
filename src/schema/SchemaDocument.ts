import { SchemaReferenceError } from "../errors.js";
import {
  NamedSchema,
  ROOT_SCHEMA_NAME,
  SchemaNode,
  UnionNode,
} from "./SchemaNode.js";

/**
 * Variant lookup for a discriminated union: discriminator literal → index
 * into `UnionNode.variants`.
 */
export interface DispatchTable {
  readonly field: string;
  readonly variants: ReadonlyMap<string, number>;
}

/**
 * A loaded schema: its named schemas, the designated root and the lookup
 * tables built at load time.
 *
 * Instances are only created by the loader, which has already checked every
 * reference, so `lookup()` failing means the document was built by hand.
 */
export class SchemaDocument {
  private readonly table: ReadonlyMap<string, NamedSchema>;

  constructor(
    readonly schemas: readonly NamedSchema[],
    private readonly dispatch: WeakMap<UnionNode, DispatchTable> = new WeakMap()
  ) {
    this.table = new Map(schemas.map((schema) => [schema.name, schema]));

    if (!this.table.has(ROOT_SCHEMA_NAME)) {
      throw new SchemaReferenceError("schema document has no root");
    }
  }

  get root(): NamedSchema {
    return this.named(ROOT_SCHEMA_NAME);
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  named(name: string): NamedSchema {
    const schema = this.table.get(name);
    if (!schema) {
      throw new SchemaReferenceError(`unresolved reference "${name}"`);
    }
    return schema;
  }

  lookup(name: string): SchemaNode {
    return this.named(name).node;
  }

  /**
   * Follows reference nodes until a non-reference node is reached.
   */
  resolve(node: SchemaNode): SchemaNode {
    let current = node;
    while (current.kind === "reference") {
      current = this.lookup(current.target);
    }
    return current;
  }

  dispatchFor(node: UnionNode): DispatchTable | undefined {
    return this.dispatch.get(node);
  }
}
