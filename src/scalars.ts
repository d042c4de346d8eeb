/**
 * Every scalar kind has a TypeScript representation and a pair of runtime
 * helpers generated decoders call: a plain scanner, used for non-nillable fields,
 * and a nullable scanner, used for nillable ones.
 *
 * Values arrive from the query engine in their storage form. The driver hands out
 * 64-bit integers as decimal strings, so they are scanned into `bigint`, while
 * `int` and `uint` are limited to the safe integer range of `number`.
 */

import type {FieldType, ScalarKind} from "./model"
import {quote} from "./util"


export interface Scalar {
    /**
     * Name of the scalar in the schema SDL.
     */
    gql: string
    tsType: string
    zero: string
    /**
     * Type of list items when the scalar appears inside a JSON list.
     */
    jsonItem: string
    scan: Scan
    nullScan: Scan
}


export interface Scan {
    helper: string
    call: (valueExp: string, column: string) => string
}


function helperWithKind(helper: string, kind: string): Scan {
    return {
        helper,
        call: (exp, column) => `${helper}(${exp}, ${quote(column)}, ${quote(kind)})`
    }
}


function helper(helper: string): Scan {
    return {
        helper,
        call: (exp, column) => `${helper}(${exp}, ${quote(column)})`
    }
}


function int(gql: string, kind: ScalarKind): Scalar {
    return {
        gql,
        tsType: 'number',
        zero: '0',
        jsonItem: 'number',
        scan: helperWithKind('scanInt', kind),
        nullScan: helperWithKind('nullInt', kind)
    }
}


function bigint(gql: string, kind: ScalarKind): Scalar {
    return {
        gql,
        tsType: 'bigint',
        zero: '0n',
        jsonItem: 'number',
        scan: helperWithKind('scanBigInt', kind),
        nullScan: helperWithKind('nullBigInt', kind)
    }
}


function float(gql: string, kind: ScalarKind): Scalar {
    return {
        gql,
        tsType: 'number',
        zero: '0',
        jsonItem: 'number',
        scan: helperWithKind('scanFloat', kind),
        nullScan: helperWithKind('nullFloat', kind)
    }
}


export const scalars: Record<ScalarKind, Scalar> = {
    int8: int('Int8', 'int8'),
    int16: int('Int16', 'int16'),
    int32: int('Int32', 'int32'),
    int: int('Int', 'int'),
    uint8: int('Uint8', 'uint8'),
    uint16: int('Uint16', 'uint16'),
    uint32: int('Uint32', 'uint32'),
    uint: int('Uint', 'uint'),
    int64: bigint('Int64', 'int64'),
    uint64: bigint('Uint64', 'uint64'),
    float32: float('Float32', 'float32'),
    float64: float('Float64', 'float64'),
    string: {
        gql: 'String',
        tsType: 'string',
        zero: "''",
        jsonItem: 'string',
        scan: helper('scanString'),
        nullScan: helper('nullString')
    },
    bool: {
        gql: 'Boolean',
        tsType: 'boolean',
        zero: 'false',
        jsonItem: 'boolean',
        scan: helper('scanBool'),
        nullScan: helper('nullBool')
    },
    time: {
        gql: 'Time',
        tsType: 'Date',
        zero: 'new Date(0)',
        jsonItem: 'string',
        scan: helper('scanTime'),
        nullScan: helper('nullTime')
    }
}


export const SCALAR_KINDS: readonly ScalarKind[] = [
    'int8', 'int16', 'int32', 'int',
    'uint8', 'uint16', 'uint32', 'uint',
    'int64', 'uint64',
    'float32', 'float64',
    'string', 'bool', 'time'
]


/**
 * SDL type names that map to a scalar kind. `Float` is an alias of `Float64`,
 * `JSON` is handled apart.
 */
const GQL_KINDS = new Map<string, ScalarKind>([['Float', 'float64']])
SCALAR_KINDS.forEach(kind => GQL_KINDS.set(scalars[kind].gql, kind))


export const JSON_SCALAR = 'JSON'


const GQL_BUILTINS = ['Int', 'Float', 'String', 'Boolean']


/**
 * Custom scalars the schema SDL declares on top of the GraphQL built-ins.
 */
export const scalars_list = Array.from(GQL_KINDS.keys())
    .filter(name => !GQL_BUILTINS.includes(name))
    .concat(JSON_SCALAR)


export function scalarKindOf(gqlName: string): ScalarKind | undefined {
    return GQL_KINDS.get(gqlName)
}


export function tsTypeOf(type: FieldType, enumTypeName: string): string {
    switch(type.kind) {
        case 'json':
            return type.tsType
        case 'enum':
            return enumTypeName
        default:
            return scalars[type.kind].tsType
    }
}


export function zeroOf(type: FieldType): string {
    switch(type.kind) {
        case 'json':
            return 'undefined'
        case 'enum':
            return quote(type.values[0])
        default:
            return scalars[type.kind].zero
    }
}
