import * as fs from 'fs';
import * as path from 'path';
import { FIXTURES_DIR, MemoryStateStore, TempDir } from '../tests/test-utils';
import {
    AutomationCLI,
    AutomationCLIOptions,
    EXIT_CONFIG_ERROR,
    EXIT_DEPLOYMENT_ERROR,
    EXIT_PARTIAL_SUCCESS,
    EXIT_SUCCESS,
    exitCodeFor
} from './cli';
import { DeploymentOrchestrator } from './deployment-orchestrator';
import { OrchestratorSettings } from './settings';
import { DeployOutcome, ResolvedStack, RunSummary, StackDeployer, StackStatus } from './types';

jest.mock('@pulumi/pulumi', () => ({
    log: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn()
    }
}));

const CATALOG = path.join(FIXTURES_DIR, 'staging', 'catalog.yaml');

function summary(counts: Partial<Record<StackStatus, number>>): RunSummary {
    return {
        deploymentName: 'catalog',
        runId: 'run-1',
        dryRun: false,
        success: (counts.failed ?? 0) === 0,
        cancelled: false,
        counts: { deployed: 0, skipped: 0, planned: 0, failed: 0, aborted: 0, ...counts },
        results: [],
        totalDuration: 0
    };
}

describe('exitCodeFor', () => {
    it('should map run outcomes to exit codes', () => {
        expect(exitCodeFor(summary({ deployed: 3, skipped: 1 }))).toBe(EXIT_SUCCESS);
        expect(exitCodeFor(summary({ deployed: 1, failed: 1, aborted: 2 }))).toBe(EXIT_DEPLOYMENT_ERROR);
        expect(exitCodeFor(summary({ deployed: 1, aborted: 2 }))).toBe(EXIT_PARTIAL_SUCCESS);
        expect(exitCodeFor(summary({}))).toBe(EXIT_SUCCESS);
    });
});

describe('AutomationCLI', () => {
    let dir: TempDir;
    let output: string[];
    let errors: string[];
    let deployed: string[];
    let failures: Set<string>;
    let settingsSeen: OrchestratorSettings[];

    const deployer: StackDeployer = {
        deploy: async (stack: ResolvedStack): Promise<DeployOutcome> => {
            deployed.push(stack.spec.fullName);
            return failures.has(stack.spec.baseName) ? { success: false, reason: 'boom' } : { success: true };
        }
    };

    function cli(overrides: Partial<AutomationCLIOptions> = {}): AutomationCLI {
        const store = new MemoryStateStore();
        return new AutomationCLI({
            env: {},
            write: line => output.push(line),
            writeError: line => errors.push(line),
            createOrchestrator: settings => {
                settingsSeen.push(settings);
                return new DeploymentOrchestrator({
                    settings,
                    env: {},
                    createDeployer: () => deployer,
                    createStateStore: () => store,
                    timestamp: () => 1700000000
                });
            },
            ...overrides
        });
    }

    beforeEach(() => {
        dir = new TempDir('cli-');
        output = [];
        errors = [];
        deployed = [];
        failures = new Set();
        settingsSeen = [];
    });

    afterEach(() => {
        dir.remove();
    });

    it('should print help without arguments', async () => {
        await expect(cli().run([])).resolves.toBe(EXIT_SUCCESS);

        expect(output).toHaveLength(1);
        expect(output[0]).toContain('stack-orchestrator <command> [options]');
    });

    it('should reject an unknown command', async () => {
        await expect(cli().run(['launch'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual(['Unknown command: launch']);
    });

    it('should reject unknown options and missing values together', async () => {
        await expect(cli().run(['deploy', 'extra', '--bogus', '--config'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual([
            'Command failed: [CLI:arguments] 3 configuration problems:\n' +
            '  - Unexpected argument: extra\n' +
            '  - Unknown option: --bogus\n' +
            '  - --config requires a value'
        ]);
    });

    it('should require a catalog', async () => {
        await expect(cli().run(['deploy'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual(['Command failed: [CLI:config] --config <catalog> is required']);
    });

    it('should report a missing catalog file', async () => {
        const missing = dir.path('missing.yaml');

        await expect(cli().run(['deploy', '--config', missing])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual([`Command failed: [CLI:config] Configuration file not found: ${missing}`]);
    });

    it('should reject a parallelism that is not a positive integer', async () => {
        await expect(cli().run(['deploy', '--config', CATALOG, '--max-parallel', '0'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual(["Command failed: [CLI:max-parallel] --max-parallel must be a positive integer, got '0'"]);
        expect(deployed).toEqual([]);
    });

    it('should deploy a catalog', async () => {
        await expect(cli().run(['deploy', '--config', CATALOG])).resolves.toBe(EXIT_SUCCESS);

        expect(deployed.sort()).toEqual(['network-staging', 'queue-staging', 'service-api-staging', 'worker-staging']);
        expect(errors).toEqual([]);
    });

    it('should exit with a deployment error when a stack fails', async () => {
        failures.add('queue');

        await expect(cli().run(['deploy', '--config', CATALOG])).resolves.toBe(EXIT_DEPLOYMENT_ERROR);
    });

    it('should exit with a configuration error for an unknown stack', async () => {
        await expect(cli().run(['deploy', '--config', CATALOG, '--stack', 'ghost'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors[0]).toMatch(/^Command failed: \[StackNameMatcher:ghost\] Stack name 'ghost' does not match any available stack\./);
        expect(deployed).toEqual([]);
    });

    it('should report partial success when the run is cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(cli({ signal: controller.signal }).run(['deploy', '--config', CATALOG])).resolves.toBe(EXIT_PARTIAL_SUCCESS);

        expect(errors).toEqual(['Run cancelled; stacks not yet started were aborted']);
    });

    it('should print the run summary as JSON', async () => {
        await cli().run(['deploy', '--config', CATALOG, '--dry-run', '--json']);

        const printed: unknown = JSON.parse(output[0]);
        expect(printed).toEqual(expect.objectContaining({
            dryRun: true,
            counts: { deployed: 0, skipped: 0, planned: 4, failed: 0, aborted: 0 }
        }));
        expect(deployed).toEqual([]);
    });

    it('should consult every --versions file first', async () => {
        const pinned = dir.write('pinned.yaml', 'org/service-api: 1234567890\n');

        const code = await cli().run([
            'plan', '--config', CATALOG, '--versions', pinned, '--stack', 'service-api',
            '--assume-external-deployed', '--verbose'
        ]);

        expect(code).toBe(EXIT_SUCCESS);
        expect(output[0].split('\n')).toEqual([
            'Deployment plan for staging: 1 batch(es), 1 stack(s)',
            'Batch 1:',
            '  service-api-staging (service_api.yaml from staging)',
            '      ImageTag = 1234567',
            '      Prefix = acme',
            'Assumed deployed for service-api: network'
        ]);
    });

    it('should print the plan', async () => {
        await expect(cli().run(['plan', '--config', CATALOG])).resolves.toBe(EXIT_SUCCESS);

        expect(output).toEqual([[
            'Deployment plan for staging: 2 batch(es), 4 stack(s)',
            'Batch 1:',
            '  network-staging (network.yaml from staging)',
            '  queue-staging (queue.yaml from production)',
            'Batch 2:',
            '  service-api-staging (service_api.yaml from staging) after network',
            '  worker-staging (worker.yaml from staging) after queue'
        ].join('\n')]);
    });

    it('should render the graph in the requested format', async () => {
        await expect(cli().run(['dump-graph', '--config', CATALOG, '--format', 'dot'])).resolves.toBe(EXIT_SUCCESS);

        expect(output[0].split('\n')[0]).toBe('digraph stacks {');
        expect(output[0]).toContain('  "queue" -> "worker" [style=dashed];');
    });

    it('should reject an unknown graph format', async () => {
        await expect(cli().run(['dump-graph', '--config', CATALOG, '--format', 'svg'])).resolves.toBe(EXIT_CONFIG_ERROR);

        expect(errors).toEqual(["Command failed: [CLI:format] --format must be text, json or dot, got 'svg'"]);
    });

    it('should validate a catalog', async () => {
        await expect(cli().run(['validate', '--config', CATALOG])).resolves.toBe(EXIT_SUCCESS);

        expect(output).toEqual([
            '✅ Catalog is valid for staging',
            '   Stacks: 5 (1 disabled)',
            '   Selected: 4 in 2 batch(es)',
            `   Version sources: ${path.join(FIXTURES_DIR, 'versions.yaml')}`
        ]);
    });

    it('should apply command-line settings over the environment', async () => {
        await cli({ env: { STACK_ORCHESTRATOR_FUNCTION_NAME: 'from-env', AWS_REGION: 'us-east-1' } }).run([
            'plan', '--config', CATALOG,
            '--function-name', 'from-flag',
            '--state-backend', 'cloudformation',
            '--state-dir', '/tmp/state'
        ]);

        expect(settingsSeen).toEqual([{
            maxParallel: 4,
            functionName: 'from-flag',
            region: 'us-east-1',
            stateBackend: 'cloudformation',
            stateDirectory: '/tmp/state'
        }]);
    });

    it('should reject an unknown state backend', async () => {
        await expect(cli().run(['plan', '--config', CATALOG, '--state-backend', 'dynamodb'])).resolves.toBe(EXIT_CONFIG_ERROR);
    });

    describe('update-versions', () => {
        it('should record a commit SHA', async () => {
            const versionsFile = dir.path('versions.yaml');

            await expect(cli().run([
                'update-versions', '--versions-file', versionsFile, '--repo', 'org/service-api', '--sha', 'abc1234'
            ])).resolves.toBe(EXIT_SUCCESS);

            expect(output).toEqual([`Updated ${versionsFile}`]);
            expect(fs.readFileSync(versionsFile, 'utf8')).toBe('versions:\n  org/service-api: abc1234\n');
        });

        it('should report an unchanged SHA', async () => {
            const versionsFile = dir.write('versions.yaml', 'versions:\n  org/service-api: abc1234\n');

            await cli().run(['update-versions', '--versions-file', versionsFile, '--repo', 'org/service-api', '--sha', 'abc1234']);

            expect(output).toEqual(['No update needed for org/service-api']);
        });

        it('should require exactly one of --sha and --manifest-url', async () => {
            const code = await cli().run([
                'update-versions', '--versions-file', dir.path('v.yaml'), '--repo', 'org/lambdas',
                '--sha', 'abc1234', '--manifest-url', 's3://builds/manifest.yaml'
            ]);

            expect(code).toBe(EXIT_CONFIG_ERROR);
            expect(errors).toEqual(['Command failed: [CLI:update-versions] Exactly one of --sha or --manifest-url is required']);
        });
    });
});
