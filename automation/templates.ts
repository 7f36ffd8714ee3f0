import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../shared/utils/error-handling';
import { isRecord } from './version-resolver';
import { TemplateInfo } from './types';

const INTRINSIC_FUNCTIONS = [
    'And', 'Base64', 'Cidr', 'Condition', 'Equals', 'FindInMap', 'GetAtt', 'GetAZs', 'If',
    'ImportValue', 'Join', 'Not', 'Or', 'Ref', 'Select', 'Split', 'Sub', 'Transform'
];

const NODE_KINDS = ['scalar', 'sequence', 'mapping'] as const;

function intrinsicKey(name: string): string {
    return name === 'Ref' || name === 'Condition' ? name : `Fn::${name}`;
}

/**
 * YAML schema that understands CloudFormation short-form tags such as !Ref and !Sub
 */
export const CLOUDFORMATION_SCHEMA = yaml.DEFAULT_SCHEMA.extend(
    INTRINSIC_FUNCTIONS.flatMap(name => NODE_KINDS.map(kind => new yaml.Type(`!${name}`, {
        kind,
        construct: (data: unknown) => ({
            [intrinsicKey(name)]: name === 'GetAtt' && typeof data === 'string' ? data.split('.') : data
        })
    })))
);

export interface TemplateLocation {
    path: string;
    sourceEnvironment: string;
}

/**
 * Environments searched for a template: the given one, then every later one in priority order
 */
export function searchEnvironments(environment: string, priority: readonly string[]): string[] {
    const index = priority.indexOf(environment);
    return index === -1 ? [environment] : priority.slice(index);
}

/**
 * Find a template under `<catalog dir>/../<env>/`; the first existing file wins
 * @throws ConfigError listing every path checked
 */
export function findTemplate(
    catalogDirectory: string,
    fileName: string,
    environment: string,
    priority: readonly string[]
): TemplateLocation {
    if (path.isAbsolute(fileName)) {
        if (fs.existsSync(fileName)) {
            return { path: fileName, sourceEnvironment: environment };
        }
        throw new ConfigError('TemplateLookup', fileName, `Template ${fileName} not found`);
    }

    const environments = searchEnvironments(environment, priority);
    const checked: string[] = [];
    for (const env of environments) {
        const candidate = path.resolve(catalogDirectory, '..', env, fileName);
        if (fs.existsSync(candidate)) {
            return { path: candidate, sourceEnvironment: env };
        }
        checked.push(candidate);
    }

    throw new ConfigError(
        'TemplateLookup',
        fileName,
        `Template ${fileName} not found in any environment of [${environments.join(', ')}], checked [${checked.join(', ')}]`
    );
}

export function hashTemplate(body: string): string {
    return crypto.createHash('sha256').update(body).digest('hex');
}

/**
 * Parse a template body and describe its declared parameters
 */
export function parseTemplate(body: string, location: TemplateLocation): TemplateInfo {
    let content: unknown;
    try {
        content = yaml.load(body, { schema: CLOUDFORMATION_SCHEMA, filename: location.path });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError('TemplateLookup', location.path, `Error parsing template ${location.path}: ${reason}`);
    }

    if (content === undefined || content === null) {
        throw new ConfigError(
            'TemplateLookup',
            location.path,
            `Template file ${location.path} is empty or contains only comments`
        );
    }
    if (!isRecord(content)) {
        throw new ConfigError(
            'TemplateLookup',
            location.path,
            `Template file ${location.path} does not contain a CloudFormation template mapping`
        );
    }

    const parameters = content.Parameters ?? {};
    if (!isRecord(parameters)) {
        throw new ConfigError('TemplateLookup', location.path, `Template ${location.path} Parameters must be a mapping`);
    }

    const declaredParameters = Object.keys(parameters);
    const optionalParameters = declaredParameters.filter(name => {
        const definition = parameters[name];
        return isRecord(definition) && definition.Default !== undefined;
    });

    return Object.freeze({
        path: location.path,
        fileName: path.basename(location.path),
        body,
        hash: hashTemplate(body),
        sourceEnvironment: location.sourceEnvironment,
        declaredParameters: Object.freeze(declaredParameters),
        optionalParameters: Object.freeze(optionalParameters)
    });
}

/**
 * Locate, read and parse the template of one stack
 */
export function loadTemplate(
    catalogDirectory: string,
    fileName: string,
    environment: string,
    priority: readonly string[]
): TemplateInfo {
    const location = findTemplate(catalogDirectory, fileName, environment, priority);
    return parseTemplate(fs.readFileSync(location.path, 'utf8'), location);
}
