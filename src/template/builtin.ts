import type {StorageDriver} from "../config"
import {decodeHelpers, fieldScanCode, idScanCode} from "../decode"
import type {Edge, Entity, Field} from "../model"
import {
    columnsConstName,
    edgesTypeName,
    enumTypeName,
    getColumns,
    getEdgeTargets,
    scanFunctionName,
    tableConstName
} from "../model.tools"
import {tsTypeOf, zeroOf} from "../scalars"
import {Output, quote, toPlural} from "../util"
import {entityOf, Scope, Template, TemplateExecutor} from "./registry"


/**
 * Sections of an entity module, in emission order, followed by the sections
 * of each configured storage driver.
 */
export const ENTITY_SECTIONS = ['header', 'import', 'enum', 'edges', 'model', 'columns']


export const STORAGE_SECTIONS: Record<StorageDriver, string[]> = {
    sql: ['decode/one', 'decode/many']
}


function fieldTsType(entity: Entity, field: Field): string {
    return tsTypeOf(field.type, enumTypeName(entity, field))
}


function edgeTsType(edge: Edge): string {
    return edge.unique ? edge.target : edge.target + '[]'
}


function join(sections: string[]): string {
    return sections
        .filter(s => s.length > 0)
        .map(s => s.endsWith('\n') ? s : s + '\n')
        .join('\n')
}


const header: Template = scope => {
    return scope.graph.config.header + '\n'
}


const imports: Template = scope => {
    let entity = entityOf(scope, 'import')
    let runtime = scope.graph.config.runtime
    let values = decodeHelpers(entity, scope.graph.config.idType)
    if (entity.edges.length > 0) {
        values.unshift('NotLoadedError')
    }
    let out = new Output()
    out.line(`import {${values.join(', ')}} from ${JSON.stringify(runtime)}`)
    out.line(`import type {Rows} from ${JSON.stringify(runtime)}`)
    for (let target of getEdgeTargets(entity)) {
        let file = scope.graph.entities.find(e => e.name == target)?.file
        if (file != null) {
            out.line(`import type {${target}} from ${JSON.stringify('./' + file)}`)
        }
    }
    return out.toString()
}


const enums: Template = scope => {
    let entity = entityOf(scope, 'enum')
    let out = new Output()
    let first = true
    for (let field of entity.fields) {
        if (field.type.kind != 'enum') continue
        let typeName = enumTypeName(entity, field)
        if (!first) {
            out.line()
        }
        first = false
        out.line(`export type ${typeName} = ${field.type.values.map(quote).join(' | ')}`)
        out.line()
        out.line(`export const ${typeName}Values: readonly ${typeName}[] = [${field.type.values.map(quote).join(', ')}]`)
    }
    return out.toString()
}


const model: Template = scope => {
    let entity = entityOf(scope, 'model')
    let out = new Output()
    out.line('/**')
    out.line(` * ${entity.name} is the model entity for the ${entity.name} schema.`)
    out.line(' */')
    out.block(`export class ${entity.name}`, () => {
        for (let field of getColumns(entity)) {
            let type = fieldTsType(entity, field)
            if (field.nillable) {
                out.line(`${field.name}?: ${type}`)
            } else {
                out.line(`${field.name}: ${type} = ${zeroOf(field.type)}`)
            }
        }
        if (entity.edges.length > 0) {
            out.line(`edges: ${edgesTypeName(entity)} = new ${edgesTypeName(entity)}()`)
        }
    })
    return out.toString()
}


const edges: Template = scope => {
    let entity = entityOf(scope, 'edges')
    if (entity.edges.length == 0) return ''
    let out = new Output()
    out.line('/**')
    out.line(` * ${edgesTypeName(entity)} holds the loaded edges of a ${entity.name}.`)
    out.line(' */')
    out.block(`export class ${edgesTypeName(entity)}`, () => {
        for (let edge of entity.edges) {
            out.line(`${edge.name}?: ${edgeTsType(edge)}`)
        }
        for (let edge of entity.edges) {
            out.line()
            out.block(`${edge.name}OrErr(): ${edgeTsType(edge)}`, () => {
                out.block(`if (this.${edge.name})`, () => {
                    out.line(`return this.${edge.name}`)
                })
                out.line(`throw new NotLoadedError(${quote(edge.name)})`)
            })
        }
    })
    return out.toString()
}


const columns: Template = scope => {
    let entity = entityOf(scope, 'columns')
    let out = new Output()
    out.line(`export const ${tableConstName(entity)} = ${quote(entity.table)}`)
    out.line()
    out.line('/**')
    out.line(` * Columns of ${entity.name} in scan order. Queries feeding ${scanFunctionName(entity.name)} must select them in this order.`)
    out.line(' */')
    out.line(`export const ${columnsConstName(entity)} = [${getColumns(entity).map(f => quote(f.column)).join(', ')}] as const`)
    return out.toString()
}


const decodeOne: Template = scope => {
    let entity = entityOf(scope, 'decode/one')
    let idType = scope.graph.config.idType
    let r = entity.receiver
    let out = new Output()
    out.line('/**')
    out.line(` * ${scanFunctionName(entity.name)} decodes the current row of rows into a ${entity.name}.`)
    out.line(' */')
    out.block(`export function ${scanFunctionName(entity.name)}(rows: Rows): ${entity.name}`, () => {
        out.line(`let values = rows.scan(${columnsConstName(entity)}.length)`)
        out.line(`let ${r} = new ${entity.name}()`)
        out.lines(idScanCode(entity, idType, r, 'values[0]').lines)
        entity.fields.forEach((field, i) => {
            out.lines(fieldScanCode(entity, field, r, `values[${i + 1}]`).lines)
        })
        out.line(`return ${r}`)
    })
    return out.toString()
}


const decodeMany: Template = scope => {
    let entity = entityOf(scope, 'decode/many')
    let plural = scope.plural ?? toPlural(entity.name)
    let out = new Output()
    out.line(`export type ${plural} = ${entity.name}[]`)
    out.line()
    out.line('/**')
    out.line(` * ${scanFunctionName(plural)} decodes the remaining rows. A row that fails to decode fails the whole call.`)
    out.line(' */')
    out.block(`export function ${scanFunctionName(plural)}(rows: Rows): ${plural}`, () => {
        out.line(`let list: ${plural} = []`)
        out.block('while (rows.next())', () => {
            out.line(`list.push(${scanFunctionName(entity.name)}(rows))`)
        })
        out.line('return list')
    })
    return out.toString()
}


const entityModule: Template = (scope: Scope, exec: TemplateExecutor) => {
    let e = entityOf(scope, 'entity')
    let names = ENTITY_SECTIONS.concat(...scope.graph.config.storage.map(driver => STORAGE_SECTIONS[driver]))
    let sections = names.map(name => {
        let sectionScope = name == 'decode/many' ? {...scope, plural: toPlural(e.name)} : scope
        return exec.execute(name, sectionScope)
    })
    return join(sections)
}


const indexModule: Template = (scope, exec) => {
    let out = new Output()
    for (let e of scope.graph.entities) {
        out.line(`export * from ${JSON.stringify('./' + e.file)}`)
    }
    return join([exec.execute('header', scope), out.toString()])
}


export const builtinTemplates: [string, Template][] = [
    ['header', header],
    ['import', imports],
    ['enum', enums],
    ['model', model],
    ['edges', edges],
    ['columns', columns],
    ['decode/one', decodeOne],
    ['decode/many', decodeMany],
    ['entity', entityModule],
    ['index', indexModule]
]
