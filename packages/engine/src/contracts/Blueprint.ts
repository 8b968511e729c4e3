/**
 * Blueprint Contract
 *
 * A blueprint is one node of the single-inheritance object-definition tree.
 * It carries only the fields it declares itself; everything else is
 * inherited from the nearest ancestor that declares it.
 *
 * Blueprints are immutable once the store that owns them is built.
 * The property engine only ever reads them.
 */

/**
 * Named field groups a blueprint can declare.
 *
 * - part: behavioral components (`Armor`, `MeleeWeapon`, `Brain`, ...)
 * - tag / xtag: free-form markers, usually with a `Value` attribute
 * - stat: creature statistics (`Strength`, `Level`, `AV`, ...)
 * - mutation: mutations with their `Level`
 * - inventory: references to other blueprints the entity carries
 * - skill: learned skills
 * - property / intproperty: string and integer properties
 * - builder: generation hooks
 */
export type FieldGroup =
    | "part"
    | "tag"
    | "xtag"
    | "stat"
    | "mutation"
    | "inventory"
    | "skill"
    | "property"
    | "intproperty"
    | "builder";

/**
 * All field groups, in declaration order.
 */
export const FIELD_GROUPS: readonly FieldGroup[] = [
    "part",
    "tag",
    "xtag",
    "stat",
    "mutation",
    "inventory",
    "skill",
    "property",
    "intproperty",
    "builder",
];

/**
 * Attribute values of one field entry, e.g. `{ AV: "3", WornOn: "Body" }`
 * for the `Armor` part. An entry may be present with no attributes.
 */
export type FieldAttributes = Readonly<Record<string, string>>;

/**
 * Entries of one group, keyed by entry name.
 */
export type FieldEntries = Readonly<Record<string, FieldAttributes>>;

/**
 * The fields a blueprint declares itself, per group.
 */
export type FieldTable = Readonly<Partial<Record<FieldGroup, FieldEntries>>>;

/**
 * A node in the inheritance tree.
 *
 * @example
 * ```typescript
 * const leatherArmor: Blueprint = {
 *     name  : "Leather Armor",
 *     parent: "BaseArmor",
 *     fields: {
 *         part: { Armor: { AV: "2", DV: "-1", WornOn: "Body" } },
 *     },
 * };
 * ```
 */
export interface Blueprint {
    /** Unique blueprint name */
    readonly name: string;

    /** Name of the parent blueprint; absent only for the root */
    readonly parent?: string;

    /** Fields declared on this blueprint itself */
    readonly fields: FieldTable;
}

/**
 * Type guard for field group names coming from untyped input (YAML, JSON).
 */
export function isFieldGroup(value: unknown): value is FieldGroup {
    return typeof value === "string" && (FIELD_GROUPS as readonly string[]).includes(value);
}
