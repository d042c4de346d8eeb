import assert from "assert"
import type {Edge, Entity, Field, FieldType, Graph} from "./model"
import {Output, renderTable, toPlural} from "./util"


const ENTITY_MAPS = new WeakMap<Graph, Map<string, Entity>>()


export function getEntity(graph: Graph, name: string): Entity {
    let map = ENTITY_MAPS.get(graph)
    if (map == null) {
        map = new Map(graph.entities.map(e => [e.name, e]))
        ENTITY_MAPS.set(graph, map)
    }
    let entity = map.get(name)
    assert(entity != null, `entity ${name} is not part of the graph`)
    return entity
}


/**
 * Identifier followed by the fields, in the order columns are scanned.
 */
export function getColumns(entity: Entity): Field[] {
    return [entity.id, ...entity.fields]
}


export function enumTypeName(entity: Entity, field: Field): string {
    return entity.name + field.name[0].toUpperCase() + field.name.slice(1)
}


export function edgesTypeName(entity: Entity): string {
    return entity.name + 'Edges'
}


export function tableConstName(entity: Entity): string {
    return entity.name + 'Table'
}


export function columnsConstName(entity: Entity): string {
    return entity.name + 'Columns'
}


export function scanFunctionName(typeName: string): string {
    return 'scan' + typeName
}


/**
 * Top-level names the module of `entity` declares, each with what it names.
 */
export function getModuleNames(entity: Entity): [string, string][] {
    let plural = toPlural(entity.name)
    let names: [string, string][] = [
        [entity.name, `entity ${entity.name}`],
        [edgesTypeName(entity), `edges of ${entity.name}`],
        [tableConstName(entity), `table of ${entity.name}`],
        [columnsConstName(entity), `columns of ${entity.name}`],
        [plural, `collection of ${entity.name}`],
        [scanFunctionName(entity.name), `decoder of ${entity.name}`],
        [scanFunctionName(plural), `collection decoder of ${entity.name}`]
    ]
    for (let field of entity.fields) {
        if (field.type.kind != 'enum') continue
        let typeName = enumTypeName(entity, field)
        names.push([typeName, `enum of ${entity.name}.${field.name}`])
        names.push([typeName + 'Values', `enum values of ${entity.name}.${field.name}`])
    }
    return names
}


export function getEdgeTargets(entity: Entity): string[] {
    let targets: string[] = []
    for (let edge of entity.edges) {
        if (edge.target != entity.name && !targets.includes(edge.target)) {
            targets.push(edge.target)
        }
    }
    return targets
}


export function describeType(type: FieldType): string {
    switch(type.kind) {
        case 'json':
            return `json<${type.tsType}>`
        case 'enum':
            return `enum<${type.name}>`
        default:
            return type.kind
    }
}


function describeEdgeType(edge: Edge): string {
    return edge.unique ? edge.target : edge.target + '[]'
}


/**
 * Human readable description of the graph, one field table and one edge table per entity.
 */
export function describeGraph(graph: Graph): string {
    let out = new Output()
    for (let entity of graph.entities) {
        out.line(entity.name + ':')
        let fields = getColumns(entity).map(f => [
            f.name,
            describeType(f.type),
            f.column,
            String(f.optional),
            String(f.nillable)
        ])
        out.lines(renderTable(['Field', 'Type', 'Column', 'Optional', 'Nillable'], fields).map(s => '  ' + s))
        if (entity.edges.length > 0) {
            let edges = entity.edges.map(e => [
                e.name,
                describeEdgeType(e),
                String(e.inverse),
                e.ref ?? '',
                e.relation,
                String(e.unique)
            ])
            out.lines(renderTable(['Edge', 'Type', 'Inverse', 'Ref', 'Relation', 'Unique'], edges).map(s => '  ' + s))
        }
        out.line()
    }
    return out.toString()
}
