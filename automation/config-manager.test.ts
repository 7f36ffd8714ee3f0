import * as path from 'path';
import { ConfigError } from '../shared/utils/error-handling';
import { captureError, TempDir } from '../tests/test-utils';
import { ConfigManager, DEFAULT_ENVIRONMENT_PRIORITY } from './config-manager';

const CATALOG_PATH = path.resolve('/catalogs/staging/catalog.yaml');

function issuesOf(content: string, env: NodeJS.ProcessEnv = {}): string[] {
    const error = captureError(() => ConfigManager.parseCatalog(content, CATALOG_PATH, { env }));
    return error instanceof ConfigError ? error.issues : [];
}

describe('ConfigManager', () => {
    describe('parseCatalog', () => {
        it('should parse a catalog with a stack list', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: staging',
                'repo_versions_file: ../versions.yaml',
                'globals:',
                '  Region: eu-central-2',
                '  ApiVersion:',
                '    $version: org/service-api',
                'stacks:',
                '  - stack_name: network',
                '  - stack_name: service-api',
                '    dependencies: [network]',
                '    parameters:',
                '      Version:',
                '        $ref: ApiVersion',
                '      Replicas: 3',
                '  - stack_name: legacy',
                '    disabled: true'
            ].join('\n'), CATALOG_PATH, { env: {} });

            expect(catalog.environment).toBe('staging');
            expect(catalog.directory).toBe(path.dirname(CATALOG_PATH));
            expect(catalog.versionFiles).toEqual([path.resolve('/catalogs/versions.yaml')]);
            expect(catalog.environmentPriority).toEqual(DEFAULT_ENVIRONMENT_PRIORITY);
            expect(catalog.globals.get('Region')).toEqual({ kind: 'literal', value: 'eu-central-2' });
            expect(catalog.globals.get('ApiVersion')).toEqual({
                kind: 'version',
                reference: { kind: 'repo-wide', repo: 'org/service-api' }
            });

            expect(catalog.stacks.map(stack => stack.fullName)).toEqual([
                'network-staging',
                'service-api-staging',
                'legacy-staging'
            ]);

            const api = catalog.stacks[1];
            expect(api.templateFile).toBe('service_api.yaml');
            expect(api.dependsOn).toEqual(['network']);
            expect(api.parameters.get('Version')).toEqual({ kind: 'global', name: 'ApiVersion' });
            expect(api.parameters.get('Replicas')).toEqual({ kind: 'literal', value: '3' });
            expect(catalog.stacks[2].disabled).toBe(true);
            expect(Object.isFrozen(catalog)).toBe(true);
        });

        it('should accept stacks as a mapping keyed by name', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: production',
                'stacks:',
                '  network:',
                '  storage:',
                '    template_file: shared/storage.yaml',
                '    dependencies: [network]'
            ].join('\n'), CATALOG_PATH, { env: {} });

            expect(catalog.stacks.map(stack => stack.baseName)).toEqual(['network', 'storage']);
            expect(catalog.stacks[1].templateFile).toBe('shared/storage.yaml');
            expect(catalog.stacks[1].fullName).toBe('storage-production');
        });

        it('should parse deployment options and environment priority', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: staging',
                'environment_priority: [staging, production]',
                'deployment_options:',
                '  max_parallel: 2',
                '  fail_fast: true',
                '  external_dependencies: assume-deployed',
                'stacks:',
                '  - stack_name: network'
            ].join('\n'), CATALOG_PATH, { env: {} });

            expect(catalog.environmentPriority).toEqual(['staging', 'production']);
            expect(catalog.deploymentOptions).toEqual({
                maxParallel: 2,
                failFast: true,
                externalDependencies: 'assume-deployed'
            });
        });

        it('should parse every reference form', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: staging',
                'stacks:',
                '  - stack_name: worker',
                '    parameters:',
                '      BucketName:',
                '        $sub: "${Prefix}-worker"',
                '      QueueStack:',
                '        $stack: queue',
                '      ResizeVersion:',
                '        $version: org/lambdas#resize',
                '      Enabled: true'
            ].join('\n'), CATALOG_PATH, { env: {} });

            const parameters = catalog.stacks[0].parameters;
            expect(parameters.get('BucketName')).toEqual({ kind: 'substitution', pattern: '${Prefix}-worker' });
            expect(parameters.get('QueueStack')).toEqual({ kind: 'stack', baseName: 'queue' });
            expect(parameters.get('ResizeVersion')).toEqual({
                kind: 'version',
                reference: { kind: 'hash-based', repo: 'org/lambdas', artifactKey: 'resize' }
            });
            expect(parameters.get('Enabled')).toEqual({ kind: 'literal', value: 'true' });
        });

        it('should substitute environment variables', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: ${DEPLOY_ENV}',
                'globals:',
                '  Owner: $TEAM_NAME',
                '  Price: $$5',
                'stacks:',
                '  - stack_name: network'
            ].join('\n'), CATALOG_PATH, { env: { DEPLOY_ENV: 'staging', TEAM_NAME: 'platform' } });

            expect(catalog.environment).toBe('staging');
            expect(catalog.globals.get('Owner')).toEqual({ kind: 'literal', value: 'platform' });
            expect(catalog.globals.get('Price')).toEqual({ kind: 'literal', value: '$5' });
        });

        it('should report every undefined environment variable', () => {
            expect(issuesOf([
                'environment: ${DEPLOY_ENV}',
                'globals:',
                '  Owner: $TEAM_NAME',
                'stacks:',
                '  - stack_name: network'
            ].join('\n'))).toEqual([
                'Environment variable DEPLOY_ENV is not defined',
                'Environment variable TEAM_NAME is not defined'
            ]);
        });

        it('should let override globals replace catalog globals', () => {
            const catalog = ConfigManager.parseCatalog([
                'environment: staging',
                'globals:',
                '  ImageTag:',
                '    $version: org/service-api',
                'stacks:',
                '  - stack_name: network'
            ].join('\n'), CATALOG_PATH, { env: {}, overrideGlobals: { ImageTag: 'pinned', Extra: 'x' } });

            expect(catalog.globals.get('ImageTag')).toEqual({ kind: 'literal', value: 'pinned' });
            expect(catalog.globals.get('Extra')).toEqual({ kind: 'literal', value: 'x' });
        });

        it('should collect every structural problem', () => {
            expect(issuesOf([
                'globals:',
                '  Bad:',
                '    $ref: a',
                '    $sub: b',
                'stacks:',
                '  - stack_name: network',
                '    owner: me',
                '  - stack_name: network',
                '  - stack_name: api',
                '    dependencies: [api]',
                '    disabled: maybe',
                '  - template_file: x.yaml',
                'deployment_options:',
                '  max_parallel: 0'
            ].join('\n'))).toEqual([
                'catalog must define an environment',
                'globals.Bad: expected exactly one of $version, $ref, $sub, $stack, got {$ref, $sub}',
                "stack network has unknown field 'owner'",
                'duplicate stack name: network',
                'stack api depends on itself',
                'stack api disabled must be true or false',
                'stacks[3] must have a stack_name',
                'deployment_options.max_parallel must be a positive integer'
            ]);
        });

        it('should reject stack names that carry the environment suffix', () => {
            expect(issuesOf([
                'environment: staging',
                'stacks:',
                '  - stack_name: network-staging'
            ].join('\n'))).toEqual(['stack network-staging already carries the environment suffix -staging']);
        });

        it('should require at least one stack', () => {
            expect(issuesOf('environment: staging\nstacks: []')).toEqual(['catalog must declare at least one stack']);
        });

        it('should reject a document that is not a mapping', () => {
            expect(() => ConfigManager.parseCatalog('- a', CATALOG_PATH, { env: {} })).toThrow(
                `Catalog ${CATALOG_PATH} must be a mapping`
            );
        });
    });

    describe('parseParameterValue', () => {
        it('should reject empty references', () => {
            expect(() => ConfigManager.parseParameterValue({ $ref: '  ' }, 'api.Version')).toThrow(
                'api.Version: $ref needs a non-empty string'
            );
        });

        it('should reject lists', () => {
            expect(() => ConfigManager.parseParameterValue(['a'], 'api.Tags')).toThrow(
                'api.Tags: unsupported value ["a"]'
            );
        });
    });

    describe('naming', () => {
        it('should derive template file names', () => {
            expect(ConfigManager.templateFileFor('Service-API-Role')).toBe('service_api_role.yaml');
        });

        it('should append the environment to full names', () => {
            expect(ConfigManager.fullNameFor('billing-role', 'staging')).toBe('billing-role-staging');
        });
    });

    describe('files', () => {
        let dir: TempDir;

        beforeEach(() => {
            dir = new TempDir('catalog-');
        });

        afterEach(() => {
            dir.remove();
        });

        it('should load a catalog from disk', () => {
            const file = dir.write('staging/catalog.yaml', 'environment: staging\nstacks:\n  - stack_name: network\n');

            const catalog = ConfigManager.loadCatalog(file, { env: {} });

            expect(catalog.path).toBe(file);
            expect(catalog.directory).toBe(path.dirname(file));
        });

        it('should report a missing catalog', () => {
            expect(() => ConfigManager.loadCatalog(dir.path('missing.yaml'))).toThrow('Failed to read catalog');
        });

        it('should read override globals', () => {
            const file = dir.write('overrides.env', '# pinned values\nImageTag = pinned\n\nOwner=platform=team\n');

            expect(ConfigManager.loadOverrideGlobals(file)).toEqual({ ImageTag: 'pinned', Owner: 'platform=team' });
        });

        it('should treat a missing override file as empty', () => {
            expect(ConfigManager.loadOverrideGlobals(dir.path('none.env'))).toEqual({});
        });

        it('should reject malformed override lines', () => {
            const file = dir.write('bad.env', 'ImageTag\n');

            expect(() => ConfigManager.loadOverrideGlobals(file)).toThrow(`${file}:1: expected KEY=VALUE`);
        });
    });
});
