import fs from "fs"
import {DefinitionNode, Kind} from "graphql"
import path from "path"
import {GenConfig, GenOptions, resolveConfig} from "./config"
import type {SchemaDefinition} from "./definition"
import {ConfigError} from "./errors"
import {generate, GeneratedFile, writeFiles} from "./gen"
import {buildGraph} from "./graph"
import {buildDefinition, parseSchema} from "./gql/schema"
import type {Graph} from "./model"
import {createRegistry, loadTemplates} from "./template/load"


const SCHEMA_EXT = '.graphql'


/**
 * Loads a schema file, or every `.graphql` file directly inside a directory
 * in name order. Files are parsed one by one and merged into one document,
 * so entities may reference entities of other files.
 */
export function loadSchema(schemaPath: string): SchemaDefinition {
    let files: string[]
    if (fs.statSync(schemaPath).isDirectory()) {
        files = fs.readdirSync(schemaPath)
            .filter(name => name.endsWith(SCHEMA_EXT))
            .sort()
            .map(name => path.join(schemaPath, name))
    } else {
        files = [schemaPath]
    }
    let definitions: DefinitionNode[] = []
    for (let file of files) {
        let doc = parseSchema(fs.readFileSync(file, 'utf-8'), file)
        definitions.push(...doc.definitions)
    }
    return buildDefinition({kind: Kind.DOCUMENT, definitions})
}


export function loadGraph(schemaPath: string, config: GenConfig): Graph {
    return buildGraph(loadSchema(schemaPath), config)
}


/**
 * Runs a generation: validates options, loads the schema and templates,
 * executes the templates and, only when all of them succeeded, writes the output.
 */
export function generateFromSchema(schemaPath: string, options: GenOptions = {}): {config: GenConfig, files: GeneratedFile[]} {
    let config = resolveConfig(schemaPath, options)
    let graph = loadGraph(schemaPath, config)
    let registry = createRegistry(loadTemplates(config.templates))
    let files = generate(graph, registry)
    writeFiles(config.target, files)
    return {config, files}
}


const INIT_TEMPLATE = (name: string) => `# ${name} holds the schema definition for the ${name} entity.
type ${name} @entity {
    id: ID!
}
`


export function initSchemas(target: string, names: string[]): string[] {
    for (let name of names) {
        if (!/^[A-Z]/.test(name)) {
            throw new ConfigError(`schema names must begin with uppercase: ${name}`)
        }
    }
    fs.mkdirSync(target, {recursive: true})
    return names.map(name => {
        let file = path.join(target, name.toLowerCase() + SCHEMA_EXT)
        fs.writeFileSync(file, INIT_TEMPLATE(name))
        return file
    })
}
