import type {GenConfig, IdType} from "./config"
import type {EdgeDefinition, EntityDefinition, FieldDefinition, SchemaDefinition} from "./definition"
import {SchemaError} from "./errors"
import type {Edge, Entity, Field, FieldType, Graph, GraphConfig, Relation} from "./model"
import {getModuleNames} from "./model.tools"
import * as runtime from "./runtime"
import {JSON_SCALAR, scalarKindOf, scalars} from "./scalars"
import {toColumn, toFile, toReceiver, toTable} from "./util"


const TYPE_NAME_REGEX = /^[A-Z][a-zA-Z0-9]*$/
const PROP_NAME_REGEX = /^[a-z][a-zA-Z0-9]*$/


/**
 * Names generated modules import from the runtime.
 */
const RESERVED_TYPE_NAMES = new Set(['Rows', 'Null', 'NotLoadedError', 'DecodeError'])


/**
 * `id` is implicit, `edges` holds the loaded edges of generated entities
 * and `constructor` can't be declared as a class property.
 */
const RESERVED_PROP_NAMES = new Set(['id', 'edges', 'constructor'])


const EDGE_ACCESSOR_SUFFIX = 'OrErr'


export type GraphOptions = Pick<GenConfig, 'idType' | 'header' | 'runtime' | 'storage'>


export function buildGraph(schema: SchemaDefinition, config: GraphOptions): Graph {
    let graphConfig: GraphConfig = {
        idType: config.idType,
        header: config.header,
        runtime: config.runtime,
        storage: config.storage
    }

    let definitions = new Map<string, EntityDefinition>()
    for (let def of schema.entities) {
        if (!TYPE_NAME_REGEX.test(def.name)) {
            throw new SchemaError(`Invalid entity name: ${def.name}. It must match ${TYPE_NAME_REGEX}.`)
        }
        if (RESERVED_TYPE_NAMES.has(def.name)) {
            throw new SchemaError(`Entity name ${def.name} is reserved`)
        }
        if (definitions.has(def.name)) {
            throw new SchemaError(`Duplicate entity name: ${def.name}`)
        }
        definitions.set(def.name, def)
    }

    let entities: Entity[] = []
    let edges: Edge[] = []
    for (let def of schema.entities) {
        let fields = def.fields.map(f => buildField(def.name, f))
        let entityEdges = def.edges.map(e => buildEdge(definitions, def, e))
        checkPropNames(def.name, fields.map(f => f.name).concat(entityEdges.map(e => e.name)))
        checkEdgeAccessors(def.name, entityEdges)
        entities.push({
            name: def.name,
            receiver: toReceiver(def.name),
            table: toTable(def.name),
            file: toFile(def.name),
            id: idField(config.idType),
            fields,
            edges: entityEdges
        })
        edges.push(...entityEdges)
    }

    checkModuleNames(entities)
    return {config: graphConfig, entities, edges}
}


function checkEdgeAccessors(entity: string, edges: Edge[]): void {
    for (let edge of edges) {
        let accessor = edge.name + EDGE_ACCESSOR_SUFFIX
        if (edges.some(e => e.name == accessor)) {
            throw new SchemaError(`Entity ${entity} declares edge ${accessor}, which collides with the accessor of edge ${edge.name}`)
        }
    }
}


/**
 * Generated modules are re-exported from one index and import the runtime,
 * so their top-level names must be unique across the graph.
 */
function checkModuleNames(entities: Entity[]): void {
    let owners = new Map<string, string>()
    for (let name of Object.keys(runtime)) {
        owners.set(name, `runtime export ${name}`)
    }
    for (let entity of entities) {
        for (let [name, owner] of getModuleNames(entity)) {
            let existing = owners.get(name)
            if (existing != null) {
                throw new SchemaError(`Name ${name} of ${owner} collides with ${existing}`)
            }
            owners.set(name, owner)
        }
    }
}


const ID_FIELD_TYPES: Record<IdType, FieldType> = {
    int32: {kind: 'int32'},
    int64: {kind: 'int64'},
    uint32: {kind: 'uint32'},
    uint64: {kind: 'uint64'},
    // stored in an integer column, see idStrategy
    string: {kind: 'string'}
}


function idField(idType: IdType): Field {
    return {
        name: 'id',
        column: 'id',
        type: ID_FIELD_TYPES[idType],
        optional: false,
        nillable: false
    }
}


function checkPropNames(entity: string, names: string[]): void {
    let seen = new Set<string>()
    for (let name of names) {
        if (!PROP_NAME_REGEX.test(name)) {
            throw new SchemaError(`Entity ${entity} has a property with invalid name: ${name}. It must match ${PROP_NAME_REGEX}.`)
        }
        if (RESERVED_PROP_NAMES.has(name)) {
            throw new SchemaError(`Entity ${entity} declares reserved property ${name}`)
        }
        if (seen.has(name)) {
            throw new SchemaError(`Entity ${entity} declares property ${name} more than once`)
        }
        seen.add(name)
    }
}


function buildField(entity: string, def: FieldDefinition): Field {
    let type = fieldType(entity, def)
    if (def.jsonType != null && type.kind != 'json') {
        throw new SchemaError(`${entity}.${def.name} is not a JSON field, but declares a JSON type`)
    }
    return {
        name: def.name,
        column: toColumn(def.name),
        type,
        optional: def.optional,
        // JSON values are absent until a non-empty payload is decoded
        nillable: type.kind == 'json' || def.nillable
    }
}


function fieldType(entity: string, def: FieldDefinition): FieldType {
    if (def.list) {
        return {kind: 'json', tsType: def.jsonType ?? listItemType(entity, def) + '[]'}
    }
    if (def.enum != null) {
        let values = def.enum.values
        if (values.length == 0) {
            throw new SchemaError(`Enum ${def.enum.name} of ${entity}.${def.name} has no values`)
        }
        if (new Set(values).size != values.length) {
            throw new SchemaError(`Enum ${def.enum.name} of ${entity}.${def.name} has duplicate values`)
        }
        return {kind: 'enum', name: def.enum.name, values: values.slice()}
    }
    if (def.type == JSON_SCALAR) {
        return {kind: 'json', tsType: def.jsonType ?? 'unknown'}
    }
    let kind = scalarKindOf(def.type)
    if (kind == null) {
        throw unrecognizedTypeError(entity, def)
    }
    return {kind}
}


function listItemType(entity: string, def: FieldDefinition): string {
    if (def.enum != null) return 'string'
    if (def.type == JSON_SCALAR) return 'unknown'
    let kind = scalarKindOf(def.type)
    if (kind == null) {
        throw unrecognizedTypeError(entity, def)
    }
    return scalars[kind].jsonItem
}


function unrecognizedTypeError(entity: string, def: FieldDefinition): SchemaError {
    return new SchemaError(`${entity}.${def.name} has unrecognized type ${def.type}`)
}


function buildEdge(definitions: Map<string, EntityDefinition>, owner: EntityDefinition, def: EdgeDefinition): Edge {
    let target = definitions.get(def.target)
    if (target == null) {
        throw new SchemaError(`Edge ${owner.name}.${def.name} references undeclared entity ${def.target}`)
    }
    let relation: Relation
    if (def.ref != null) {
        let assoc = target.edges.find(e => e.name == def.ref)
        if (assoc == null || assoc.ref != null || assoc.target != owner.name) {
            throw new SchemaError(
                `Edge ${owner.name}.${def.name} references ${def.target}.${def.ref}, which is not an edge of ${def.target} to ${owner.name}`
            )
        }
        relation = inverseRelation(assocRelation(assoc, target, def))
    } else {
        let inverse = findInverse(target, owner.name, def.name)
        relation = assocRelation(def, owner, inverse)
    }
    return {
        name: def.name,
        owner: owner.name,
        target: def.target,
        unique: def.unique,
        required: def.required,
        inverse: def.ref != null,
        ref: def.ref,
        relation
    }
}


function findInverse(target: EntityDefinition, owner: string, assoc: string): EdgeDefinition | undefined {
    return target.edges.find(e => e.ref == assoc && e.target == owner)
}


function assocRelation(assoc: EdgeDefinition, owner: EntityDefinition, inverse: EdgeDefinition | undefined): Relation {
    if (inverse == null) {
        if (assoc.target == owner.name) {
            return assoc.unique ? 'O2O' : 'M2M'
        }
        return assoc.unique ? 'M2O' : 'M2M'
    }
    if (assoc.unique && inverse.unique) return 'O2O'
    if (inverse.unique) return 'O2M'
    if (assoc.unique) return 'M2O'
    return 'M2M'
}


function inverseRelation(relation: Relation): Relation {
    switch(relation) {
        case 'O2M':
            return 'M2O'
        case 'M2O':
            return 'O2M'
        default:
            return relation
    }
}
