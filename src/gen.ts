import fs from "fs"
import path from "path"
import type {Graph} from "./model"
import {builtinTemplates} from "./template/builtin"
import type {TemplateRegistry} from "./template/registry"


export interface GeneratedFile {
    path: string
    content: string
}


const BUILTIN_NAMES = new Set(builtinTemplates.map(([name]) => name))


const ENTITY_TEMPLATE_PREFIX = 'entity/'


/**
 * Executes the templates of `registry` against the graph. Nothing is written:
 * the complete output is returned once every template succeeded.
 *
 * Besides the built-in entity modules and index, every additional template
 * is emitted: `entity/<name>` once per entity into `<file>_<name>.ts`,
 * any other once into `<name>.ts`. Names starting with `_` are only included.
 */
export function generate(graph: Graph, registry: TemplateRegistry): GeneratedFile[] {
    let files: GeneratedFile[] = []
    for (let entity of graph.entities) {
        files.push({
            path: entity.file + '.ts',
            content: registry.execute('entity', {graph, entity})
        })
    }
    files.push({
        path: 'index.ts',
        content: registry.execute('index', {graph})
    })
    for (let name of registry.names()) {
        if (BUILTIN_NAMES.has(name) || name.startsWith('_')) continue
        if (name.startsWith(ENTITY_TEMPLATE_PREFIX)) {
            let suffix = name.slice(ENTITY_TEMPLATE_PREFIX.length).replace(/\//g, '_')
            for (let entity of graph.entities) {
                files.push({
                    path: `${entity.file}_${suffix}.ts`,
                    content: registry.execute(name, {graph, entity})
                })
            }
        } else {
            files.push({
                path: name.replace(/\//g, '_') + '.ts',
                content: registry.execute(name, {graph})
            })
        }
    }
    return files
}


export function writeFiles(target: string, files: GeneratedFile[]): void {
    fs.mkdirSync(target, {recursive: true})
    for (let file of files) {
        fs.writeFileSync(path.join(target, file.path), file.content)
    }
}
