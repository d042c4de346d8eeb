import fs from "fs"
import path from "path"
import {builtinTemplates} from "./builtin"
import {TemplateRegistry, Template} from "./registry"
import {parseTemplates} from "./text"


/**
 * Loads templates from files or directories. A directory contributes
 * its regular files in name order, subdirectories are skipped.
 */
export function loadTemplates(paths: string[]): [string, Template][] {
    let templates: [string, Template][] = []
    for (let p of paths) {
        let stat = fs.statSync(p)
        if (stat.isDirectory()) {
            let files = fs.readdirSync(p, {withFileTypes: true})
                .filter(entry => entry.isFile())
                .map(entry => entry.name)
                .sort()
            for (let file of files) {
                templates.push(...loadTemplateFile(path.join(p, file)))
            }
        } else {
            templates.push(...loadTemplateFile(p))
        }
    }
    return templates
}


function loadTemplateFile(file: string): [string, Template][] {
    return parseTemplates(fs.readFileSync(file, 'utf-8'), file)
}


/**
 * Built-in templates overridden by `external`, later entries winning.
 */
export function createRegistry(external: [string, Template][] = []): TemplateRegistry {
    let registry = new TemplateRegistry()
    registry.addAll(builtinTemplates)
    registry.addAll(external)
    return registry
}
