/**
 * External templates are plain text. A source holds one or more blocks
 *
 *     {{define "name"}}
 *     ...
 *     {{end}}
 *
 * separated by whitespace only, or, when it has none, a single template named
 * after the file. Inside a body
 * `{{ var }}` interpolates a scope variable and `{{ template "name" }}` includes
 * another template of the registry.
 */

import path from "path"
import {TemplateError} from "../errors"
import {getColumns} from "../model.tools"
import {toPlural} from "../util"
import type {Scope, Template} from "./registry"


const DEFINE_REGEX = /\{\{\s*define\s+"([^"]+)"\s*\}\}([\s\S]*?)\{\{\s*end\s*\}\}/g
const ACTION_REGEX = /\{\{\s*([\s\S]*?)\s*\}\}/g
const INCLUDE_REGEX = /^template\s+"([^"]+)"$/
const VAR_REGEX = /^[a-z]+(\.[a-z]+)?$/


type Part =
    {kind: 'text', text: string} |
    {kind: 'var', name: string} |
    {kind: 'include', name: string}


export function parseTemplates(source: string, fileName: string): [string, Template][] {
    let templates: [string, Template][] = []
    for (let match of source.matchAll(DEFINE_REGEX)) {
        let name = match[1]
        templates.push([name, compileTemplate(name, stripLeadingNewline(match[2]))])
    }
    if (templates.length == 0) {
        let name = path.basename(fileName, path.extname(fileName))
        templates.push([name, compileTemplate(name, source)])
    } else if (source.replace(DEFINE_REGEX, '').trim() != '') {
        throw new TemplateError(`${fileName}: text outside of define blocks`)
    }
    return templates
}


function stripLeadingNewline(body: string): string {
    if (body.startsWith('\r\n')) return body.slice(2)
    if (body.startsWith('\n')) return body.slice(1)
    return body
}


export function compileTemplate(name: string, body: string): Template {
    let parts = parseBody(name, body)
    return (scope, exec) => {
        let vars = scopeVars(scope)
        let out = ''
        for (let part of parts) {
            switch(part.kind) {
                case 'text':
                    out += part.text
                    break
                case 'var': {
                    let value = vars.get(part.name)
                    if (value == null) {
                        throw new TemplateError(
                            `template ${JSON.stringify(name)}: ${part.name} is not defined` + (scope.entity ? '' : ' outside of entity templates')
                        )
                    }
                    out += value
                    break
                }
                case 'include':
                    out += exec.execute(part.name, scope)
                    break
            }
        }
        return out
    }
}


function parseBody(name: string, body: string): Part[] {
    let parts: Part[] = []
    let pos = 0
    for (let match of body.matchAll(ACTION_REGEX)) {
        let index = match.index ?? 0
        if (index > pos) {
            parts.push({kind: 'text', text: body.slice(pos, index)})
        }
        let action = match[1]
        let include = INCLUDE_REGEX.exec(action)
        if (include) {
            parts.push({kind: 'include', name: include[1]})
        } else if (VAR_REGEX.test(action)) {
            parts.push({kind: 'var', name: action})
        } else {
            throw new TemplateError(`template ${JSON.stringify(name)}: unsupported action {{${action}}}`)
        }
        pos = index + match[0].length
    }
    if (pos < body.length) {
        parts.push({kind: 'text', text: body.slice(pos)})
    }
    return parts
}


export function scopeVars(scope: Scope): Map<string, string> {
    let graph = scope.graph
    let vars = new Map<string, string>([
        ['header', graph.config.header],
        ['runtime', graph.config.runtime],
        ['entities', graph.entities.map(e => e.name).join(', ')]
    ])
    let entity = scope.entity
    if (entity) {
        vars.set('entity.name', entity.name)
        vars.set('entity.receiver', entity.receiver)
        vars.set('entity.table', entity.table)
        vars.set('entity.file', entity.file)
        vars.set('entity.plural', scope.plural ?? toPlural(entity.name))
        vars.set('entity.columns', getColumns(entity).map(f => f.column).join(', '))
    }
    return vars
}
