import type {IdType, StorageDriver} from "./config"


export type Name = string


export type IntKind = 'int8' | 'int16' | 'int32' | 'int' | 'uint8' | 'uint16' | 'uint32' | 'uint'


export type BigIntKind = 'int64' | 'uint64'


export type FloatKind = 'float32' | 'float64'


export type ScalarKind = IntKind | BigIntKind | FloatKind | 'string' | 'bool' | 'time'


export interface Graph {
    readonly config: GraphConfig
    readonly entities: readonly Entity[]
    readonly edges: readonly Edge[]
}


export interface GraphConfig {
    readonly idType: IdType
    readonly header: string
    readonly runtime: string
    readonly storage: readonly StorageDriver[]
}


export interface Entity {
    readonly name: Name
    readonly receiver: string
    readonly table: string
    readonly file: string
    readonly id: Field
    readonly fields: readonly Field[]
    readonly edges: readonly Edge[]
}


export interface Field {
    readonly name: Name
    readonly column: string
    readonly type: FieldType
    readonly optional: boolean
    readonly nillable: boolean
}


export type FieldType =
    ScalarFieldType |
    JsonFieldType |
    EnumFieldType


export interface ScalarFieldType {
    readonly kind: ScalarKind
}


export interface JsonFieldType {
    readonly kind: 'json'
    readonly tsType: string
}


export interface EnumFieldType {
    readonly kind: 'enum'
    readonly name: Name
    readonly values: readonly string[]
}


export type Relation = 'O2O' | 'O2M' | 'M2O' | 'M2M'


export interface Edge {
    readonly name: Name
    readonly owner: Name
    readonly target: Name
    readonly unique: boolean
    readonly required: boolean
    readonly inverse: boolean
    readonly ref?: Name
    readonly relation: Relation
}
