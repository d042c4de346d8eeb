import path from "path"
import {ConfigError} from "./errors"


export type IdType = 'int32' | 'int64' | 'uint32' | 'uint64' | 'string'


export const ID_TYPES: readonly IdType[] = ['int32', 'int64', 'uint32', 'uint64', 'string']


/**
 * Storage drivers generated decoders read from. `sql` decodes positional rows of a query.
 */
export type StorageDriver = 'sql'


export const STORAGE_DRIVERS: readonly StorageDriver[] = ['sql']


export const DEFAULT_HEADER = '// Code generated by schemagen, DO NOT EDIT.'


export const DEFAULT_RUNTIME = 'schemagen/runtime'


export interface GenOptions {
    idType?: string
    header?: string
    target?: string
    templates?: string[]
    runtime?: string
    storage?: string[]
}


export interface GenConfig {
    idType: IdType
    header: string
    target: string
    templates: string[]
    runtime: string
    storage: StorageDriver[]
}


/**
 * String identifiers are always backed by an integer column,
 * there is no string-native identifier storage.
 */
export function parseIdType(value: string): IdType {
    let idType = ID_TYPES.find(t => t == value)
    if (idType == null) {
        throw new ConfigError(`invalid id type: ${value}. It must be one of ${ID_TYPES.join(', ')}`)
    }
    return idType
}


export function parseStorage(names: string[]): StorageDriver[] {
    if (names.length == 0) {
        throw new ConfigError('at least one storage driver is required')
    }
    let drivers: StorageDriver[] = []
    for (let name of names) {
        let driver = STORAGE_DRIVERS.find(d => d == name)
        if (driver == null) {
            throw new ConfigError(`invalid storage driver: ${name}. It must be one of ${STORAGE_DRIVERS.join(', ')}`)
        }
        if (!drivers.includes(driver)) {
            drivers.push(driver)
        }
    }
    return drivers
}


/**
 * Validates options and fills in defaults. Touches no files, so configuration
 * problems surface before the schema is loaded.
 */
export function resolveConfig(schemaPath: string, options: GenOptions = {}): GenConfig {
    let idType = options.idType == null ? 'int32' : parseIdType(options.idType)
    let runtime = options.runtime ?? DEFAULT_RUNTIME
    if (!runtime) {
        throw new ConfigError('runtime module must not be empty')
    }
    return {
        idType,
        header: options.header ?? DEFAULT_HEADER,
        target: options.target || path.dirname(path.resolve(schemaPath)),
        templates: options.templates ?? [],
        runtime,
        storage: parseStorage(options.storage ?? ['sql'])
    }
}
