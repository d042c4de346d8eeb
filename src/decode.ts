import type {IdType} from "./config"
import {TemplateError} from "./errors"
import type {Entity, Field} from "./model"
import {enumTypeName} from "./model.tools"
import {Scan, scalars} from "./scalars"
import {quote, upperCaseFirst} from "./util"


/**
 * How a field is materialized from a scanned value.
 */
export type DecodeStrategy =
    JsonStrategy |
    NillableTimeStrategy |
    NillableStrategy |
    PlainStrategy


/**
 * Raw bytes unmarshalled when non-empty, an empty payload leaves the field unset.
 */
export interface JsonStrategy {
    kind: 'json'
    tsType: string
}


/**
 * Scanned straight into `Date | undefined`, no validity flag involved.
 */
export interface NillableTimeStrategy {
    kind: 'nillable-time'
    scan: Scan
}


/**
 * Scanned into a `Null<T>` wrapper, the field is only assigned when valid.
 */
export interface NillableStrategy {
    kind: 'nillable'
    scan: Scan
}


export interface PlainStrategy {
    kind: 'plain'
    scan: Scan
}


export type IdStrategy =
    {kind: 'string-id'} |
    {kind: 'native-id', scan: Scan}


export function decodeStrategy(entity: Entity, field: Field): DecodeStrategy {
    let type = field.type
    if (type.kind == 'json') {
        return {kind: 'json', tsType: type.tsType}
    }
    if (field.nillable && type.kind == 'time') {
        return {kind: 'nillable-time', scan: scalars.time.nullScan}
    }
    let scan: Scan
    let nullScan: Scan
    if (type.kind == 'enum') {
        let values = enumTypeName(entity, field) + 'Values'
        scan = enumScan('scanEnum', values)
        nullScan = enumScan('nullEnum', values)
    } else {
        let scalar = scalars[type.kind]
        if (scalar == null) {
            throw new TemplateError(`can't resolve decode strategy of ${entity.name}.${field.name}: unknown type ${type.kind}`)
        }
        scan = scalar.scan
        nullScan = scalar.nullScan
    }
    if (field.nillable) {
        return {kind: 'nillable', scan: nullScan}
    }
    return {kind: 'plain', scan}
}


function enumScan(helper: string, values: string): Scan {
    return {
        helper,
        call: (exp, column) => `${helper}(${exp}, ${quote(column)}, ${values})`
    }
}


/**
 * String identifiers are stored as integers and converted to their decimal form,
 * every other identifier type is scanned as is.
 */
export function idStrategy(idType: IdType): IdStrategy {
    switch(idType) {
        case 'string':
            return {kind: 'string-id'}
        case 'int32':
            return {kind: 'native-id', scan: scalars.int32.scan}
        case 'uint32':
            return {kind: 'native-id', scan: scalars.uint32.scan}
        case 'int64':
            return {kind: 'native-id', scan: scalars.int64.scan}
        case 'uint64':
            return {kind: 'native-id', scan: scalars.uint64.scan}
        default:
            throw new TemplateError(`can't resolve decode strategy of identifier type ${idType}`)
    }
}


export interface ScanCode {
    lines: string[]
    helpers: string[]
}


/**
 * Statements assigning the field `field` of `receiver` from `valueExp`.
 */
export function fieldScanCode(entity: Entity, field: Field, receiver: string, valueExp: string): ScanCode {
    let strategy = decodeStrategy(entity, field)
    let target = `${receiver}.${field.name}`
    let local = 'v' + upperCaseFirst(field.name)
    switch(strategy.kind) {
        case 'json':
            return {
                lines: [
                    `let ${local} = scanBytes(${valueExp}, ${quote(field.column)})`,
                    `if (${local}.length > 0) {`,
                    `    ${target} = unmarshal<${strategy.tsType}>(${local}, ${quote(field.column)})`,
                    `}`
                ],
                helpers: ['scanBytes', 'unmarshal']
            }
        case 'nillable-time':
            return {
                lines: [`${target} = ${strategy.scan.call(valueExp, field.column)}`],
                helpers: [strategy.scan.helper]
            }
        case 'nillable':
            return {
                lines: [
                    `let ${local} = ${strategy.scan.call(valueExp, field.column)}`,
                    `if (${local}.valid) {`,
                    `    ${target} = ${local}.value`,
                    `}`
                ],
                helpers: [strategy.scan.helper]
            }
        case 'plain':
            return {
                lines: [`${target} = ${strategy.scan.call(valueExp, field.column)}`],
                helpers: [strategy.scan.helper]
            }
    }
}


export function idScanCode(entity: Entity, idType: IdType, receiver: string, valueExp: string): ScanCode {
    let strategy = idStrategy(idType)
    let target = `${receiver}.${entity.id.name}`
    switch(strategy.kind) {
        case 'string-id':
            return {
                lines: [`${target} = scanStringId(${valueExp}, ${quote(entity.id.column)})`],
                helpers: ['scanStringId']
            }
        case 'native-id':
            return {
                lines: [`${target} = ${strategy.scan.call(valueExp, entity.id.column)}`],
                helpers: [strategy.scan.helper]
            }
    }
}


/**
 * Runtime helpers the decoder of `entity` calls, in first use order.
 */
export function decodeHelpers(entity: Entity, idType: IdType): string[] {
    let helpers = new Set<string>(idScanCode(entity, idType, 'e', '').helpers)
    for (let field of entity.fields) {
        fieldScanCode(entity, field, 'e', '').helpers.forEach(h => helpers.add(h))
    }
    return Array.from(helpers)
}
