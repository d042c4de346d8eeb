#!/usr/bin/env node

import {Command} from "commander"
import {DEFAULT_HEADER, DEFAULT_RUNTIME, ID_TYPES, parseIdType, resolveConfig, STORAGE_DRIVERS} from "./config"
import {describeGraph} from "./model.tools"
import {generateFromSchema, initSchemas, loadGraph} from "./tools"


function collect(value: string, previous: string[] = []): string[] {
    return previous.concat(value.split(',').filter(s => s.length > 0))
}


export function buildProgram(): Command {
    let program = new Command()
        .name('schemagen')
        .description('Generates typed row decoders from a GraphQL entity schema')

    program
        .command('init')
        .description('initialize an environment with zero or more schemas')
        .argument('[names...]', 'entity names, starting with an uppercase letter')
        .option('--target <dir>', 'target directory for schemas', 'schema')
        .action((names: string[], options: {target: string}) => {
            for (let file of initSchemas(options.target, names)) {
                console.log(file)
            }
        })

    program
        .command('describe')
        .description('print a description of the graph schema')
        .argument('<schema>', 'schema file or directory')
        .action((schema: string) => {
            let config = resolveConfig(schema)
            process.stdout.write(describeGraph(loadGraph(schema, config)))
        })

    program
        .command('generate')
        .description('generate decoders for the schema file or directory')
        .argument('<schema>', 'schema file or directory')
        .option('--idtype <type>', `type of the id field, one of ${ID_TYPES.join(', ')}`, parseIdType, 'int32')
        .option('--header <text>', 'override codegen header', DEFAULT_HEADER)
        .option('--target <dir>', 'target directory for codegen')
        .option('--template <path>', 'external templates to execute, may be repeated', collect, [])
        .option('--storage <driver>', `storage drivers to generate decoders for, one of ${STORAGE_DRIVERS.join(', ')} (default: sql)`, collect)
        .option('--runtime <module>', 'module generated code imports the runtime from', DEFAULT_RUNTIME)
        .action((schema: string, options: {idtype: string, header: string, target?: string, template: string[], runtime: string, storage?: string[]}) => {
            let {config, files} = generateFromSchema(schema, {
                idType: options.idtype,
                header: options.header,
                target: options.target,
                templates: options.template,
                runtime: options.runtime,
                storage: options.storage
            })
            console.log(`generated ${files.length} files in ${config.target}`)
        })

    return program
}


function main() {
    try {
        buildProgram().parse(process.argv)
    } catch(e: unknown) {
        console.error(e instanceof Error ? e.message : e)
        process.exit(1)
    }
}


if (require.main === module) {
    main()
}
