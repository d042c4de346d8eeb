import {DecodeError} from "../errors"
import type {BigIntKind, FloatKind, IntKind} from "../model"


export type Null<T> = {valid: true, value: T} | {valid: false}


const INT_RANGES: Record<IntKind, [number, number]> = {
    int8: [-(2 ** 7), 2 ** 7 - 1],
    int16: [-(2 ** 15), 2 ** 15 - 1],
    int32: [-(2 ** 31), 2 ** 31 - 1],
    int: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
    uint8: [0, 2 ** 8 - 1],
    uint16: [0, 2 ** 16 - 1],
    uint32: [0, 2 ** 32 - 1],
    uint: [0, Number.MAX_SAFE_INTEGER]
}


const BIGINT_RANGES: Record<BigIntKind, [bigint, bigint]> = {
    int64: [-(2n ** 63n), 2n ** 63n - 1n],
    uint64: [0n, 2n ** 64n - 1n]
}


function isNull(value: unknown): value is null | undefined {
    return value === null || value === undefined
}


function describe(value: unknown): string {
    if (value instanceof Uint8Array) return `bytes(${value.length})`
    if (typeof value == 'string') return JSON.stringify(value)
    return String(value)
}


function invalid(kind: string, value: unknown, column: string): DecodeError {
    if (isNull(value)) {
        return new DecodeError(`unexpected NULL for ${kind}`, column)
    }
    return new DecodeError(`can't convert ${describe(value)} to ${kind}`, column)
}


export function scanInt(value: unknown, column: string, kind: IntKind): number {
    let n: number
    if (typeof value == 'number') {
        n = value
    } else if (typeof value == 'bigint') {
        n = Number(value)
    } else if (typeof value == 'string' && /^[+\-]?\d+$/.test(value)) {
        n = Number(value)
    } else {
        throw invalid(kind, value, column)
    }
    let [min, max] = INT_RANGES[kind]
    if (!Number.isInteger(n) || n < min || n > max) {
        throw new DecodeError(`${describe(value)} is out of ${kind} range`, column)
    }
    return n
}


export function scanBigInt(value: unknown, column: string, kind: BigIntKind): bigint {
    let n: bigint
    if (typeof value == 'bigint') {
        n = value
    } else if (typeof value == 'number' && Number.isInteger(value)) {
        n = BigInt(value)
    } else if (typeof value == 'string' && /^[+\-]?\d+$/.test(value)) {
        n = BigInt(value)
    } else {
        throw invalid(kind, value, column)
    }
    let [min, max] = BIGINT_RANGES[kind]
    if (n < min || n > max) {
        throw new DecodeError(`${describe(value)} is out of ${kind} range`, column)
    }
    return n
}


export function scanFloat(value: unknown, column: string, kind: FloatKind): number {
    if (typeof value == 'number') {
        return kind == 'float32' ? Math.fround(value) : value
    }
    if (typeof value == 'string' && value.trim() != '') {
        let n = Number(value)
        if (!isNaN(n)) {
            return kind == 'float32' ? Math.fround(n) : n
        }
    }
    throw invalid(kind, value, column)
}


export function scanString(value: unknown, column: string): string {
    if (typeof value == 'string') return value
    throw invalid('string', value, column)
}


export function scanBool(value: unknown, column: string): boolean {
    switch(value) {
        case true:
        case 1:
            return true
        case false:
        case 0:
            return false
        default:
            throw invalid('bool', value, column)
    }
}


export function scanTime(value: unknown, column: string): Date {
    let date: Date | undefined
    if (value instanceof Date) {
        date = value
    } else if (typeof value == 'string' || typeof value == 'number') {
        date = new Date(value)
    }
    if (date == null || isNaN(date.getTime())) {
        throw invalid('time', value, column)
    }
    return date
}


export function scanEnum<T extends string>(value: unknown, column: string, values: readonly T[]): T {
    let match = values.find(v => v === value)
    if (match == null) {
        throw new DecodeError(`${describe(value)} is not one of ${values.join(', ')}`, column)
    }
    return match
}


/**
 * Raw payload of a JSON column. SQL NULL scans as an empty buffer.
 */
export function scanBytes(value: unknown, column: string): Uint8Array {
    if (isNull(value)) return new Uint8Array(0)
    if (value instanceof Uint8Array) return value
    if (typeof value == 'string') return Buffer.from(value, 'utf-8')
    throw invalid('bytes', value, column)
}


export function unmarshal<T>(bytes: Uint8Array, column: string): T {
    let text = new TextDecoder().decode(bytes)
    try {
        return JSON.parse(text)
    } catch(e: unknown) {
        throw new DecodeError('invalid JSON payload', column, e)
    }
}


/**
 * String identifiers are carried as integers and read in their decimal form.
 */
export function scanStringId(value: unknown, column: string): string {
    return scanBigInt(value, column, 'int64').toString()
}


export function nullable<T>(value: unknown, scan: (value: unknown) => T): Null<T> {
    if (isNull(value)) return {valid: false}
    return {valid: true, value: scan(value)}
}


export function nullInt(value: unknown, column: string, kind: IntKind): Null<number> {
    return nullable(value, v => scanInt(v, column, kind))
}


export function nullBigInt(value: unknown, column: string, kind: BigIntKind): Null<bigint> {
    return nullable(value, v => scanBigInt(v, column, kind))
}


export function nullFloat(value: unknown, column: string, kind: FloatKind): Null<number> {
    return nullable(value, v => scanFloat(v, column, kind))
}


export function nullString(value: unknown, column: string): Null<string> {
    return nullable(value, v => scanString(v, column))
}


export function nullBool(value: unknown, column: string): Null<boolean> {
    return nullable(value, v => scanBool(v, column))
}


export function nullEnum<T extends string>(value: unknown, column: string, values: readonly T[]): Null<T> {
    return nullable(value, v => scanEnum(v, column, values))
}


export function nullTime(value: unknown, column: string): Date | undefined {
    return isNull(value) ? undefined : scanTime(value, column)
}
