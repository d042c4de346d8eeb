/**
 * Schema as produced by a loader: plain data, ordered as declared.
 */
export interface SchemaDefinition {
    entities: EntityDefinition[]
}


export interface EntityDefinition {
    name: string
    fields: FieldDefinition[]
    edges: EdgeDefinition[]
}


export interface FieldDefinition {
    name: string
    /**
     * Declared type name, e.g. `Int32`, `String` or the name of an enum.
     */
    type: string
    optional: boolean
    nillable: boolean
    /**
     * The field holds a list of `type` items.
     */
    list?: boolean
    enum?: EnumDefinition
    /**
     * TypeScript type of a JSON field's value.
     */
    jsonType?: string
}


export interface EnumDefinition {
    name: string
    values: string[]
}


export interface EdgeDefinition {
    name: string
    target: string
    unique: boolean
    required: boolean
    /**
     * Set on inverse edges: the association edge of `target` this edge mirrors.
     */
    ref?: string
}
