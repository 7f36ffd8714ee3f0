#!/usr/bin/env node

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { ConfigError, isPreExecutionError, toError } from '../shared/utils/error-handling';
import { createAwsClients } from './aws-clients';
import { DeploymentOrchestrator, OrchestrationRequest } from './deployment-orchestrator';
import { isGraphFormat, renderGraph, renderPlanText } from './graph-report';
import { isStateBackend, loadSettings, OrchestratorSettings } from './settings';
import { RunSummary } from './types';
import { VersionsFileUpdater } from './versions-file-updater';

export const EXIT_SUCCESS = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_DEPLOYMENT_ERROR = 2;
export const EXIT_PARTIAL_SUCCESS = 3;

/**
 * Exit code of a finished run
 */
export function exitCodeFor(summary: RunSummary): number {
    if (summary.counts.failed > 0) {
        return EXIT_DEPLOYMENT_ERROR;
    }
    if (summary.counts.aborted > 0) {
        return EXIT_PARTIAL_SUCCESS;
    }
    return EXIT_SUCCESS;
}

export interface CliOptions {
    config?: string;
    versions: string[];
    stack?: string;
    dryRun: boolean;
    force: boolean;
    maxParallel?: string;
    failFast: boolean;
    timeout?: string;
    assumeExternalDeployed: boolean;
    functionName?: string;
    region?: string;
    stateBackend?: string;
    stateDir?: string;
    overrideGlobalsFile?: string;
    metricsFile?: string;
    json: boolean;
    verbose: boolean;
    format?: string;
    versionsFile?: string;
    repo?: string;
    sha?: string;
    manifestUrl?: string;
}

type ValueOption =
    'config' | 'stack' | 'maxParallel' | 'timeout' | 'functionName' | 'region' | 'stateBackend' | 'stateDir' |
    'overrideGlobalsFile' | 'metricsFile' | 'format' | 'versionsFile' | 'repo' | 'sha' | 'manifestUrl';
type FlagOption = 'dryRun' | 'force' | 'failFast' | 'assumeExternalDeployed' | 'json' | 'verbose';

const VALUE_OPTIONS = new Map<string, ValueOption>([
    ['config', 'config'],
    ['stack', 'stack'],
    ['max-parallel', 'maxParallel'],
    ['timeout', 'timeout'],
    ['function-name', 'functionName'],
    ['region', 'region'],
    ['state-backend', 'stateBackend'],
    ['state-dir', 'stateDir'],
    ['override-globals-file', 'overrideGlobalsFile'],
    ['metrics-file', 'metricsFile'],
    ['format', 'format'],
    ['versions-file', 'versionsFile'],
    ['repo', 'repo'],
    ['sha', 'sha'],
    ['manifest-url', 'manifestUrl']
]);

const FLAG_OPTIONS = new Map<string, FlagOption>([
    ['dry-run', 'dryRun'],
    ['force', 'force'],
    ['fail-fast', 'failFast'],
    ['assume-external-deployed', 'assumeExternalDeployed'],
    ['json', 'json'],
    ['verbose', 'verbose']
]);

export interface AutomationCLIOptions {
    /** Builds the orchestrator from the effective settings */
    createOrchestrator?: (settings: OrchestratorSettings) => DeploymentOrchestrator;
    env?: NodeJS.ProcessEnv;
    /** Cancels a running deploy; stacks not yet started are aborted */
    signal?: AbortSignal;
    write?: (line: string) => void;
    writeError?: (line: string) => void;
}

/**
 * Command-line interface for stack deployments
 */
class AutomationCLI {
    private readonly options: AutomationCLIOptions;
    private readonly write: (line: string) => void;
    private readonly writeError: (line: string) => void;

    constructor(options: AutomationCLIOptions = {}) {
        this.options = options;
        this.write = options.write ?? (line => console.log(line));
        this.writeError = options.writeError ?? (line => console.error(line));
    }

    /**
     * Run one command
     * @param args Arguments after the program name
     * @returns Process exit code
     */
    async run(args: string[]): Promise<number> {
        if (args.length === 0) {
            this.printHelp();
            return EXIT_SUCCESS;
        }

        const command = args[0];

        try {
            switch (command) {
                case 'deploy':
                    return await this.handleDeploy(args.slice(1));
                case 'plan':
                case 'dump':
                    return await this.handlePlan(args.slice(1));
                case 'dump-graph':
                    return await this.handleDumpGraph(args.slice(1));
                case 'validate':
                    return await this.handleValidate(args.slice(1));
                case 'update-versions':
                    return await this.handleUpdateVersions(args.slice(1));
                case 'help':
                    this.printHelp();
                    return EXIT_SUCCESS;
                default:
                    this.writeError(`Unknown command: ${command}`);
                    this.printHelp();
                    return EXIT_CONFIG_ERROR;
            }
        } catch (error) {
            const failure = toError(error);
            this.writeError(`Command failed: ${failure.message}`);
            return isPreExecutionError(error) ? EXIT_CONFIG_ERROR : EXIT_DEPLOYMENT_ERROR;
        }
    }

    private async handleDeploy(args: string[]): Promise<number> {
        const options = this.parseOptions(args);
        const summary = await this.orchestrator(options).deploy(this.buildRequest(options));

        if (options.json) {
            this.write(JSON.stringify(summary, null, 2));
        }
        if (summary.cancelled) {
            this.writeError('Run cancelled; stacks not yet started were aborted');
        }
        return exitCodeFor(summary);
    }

    private async handlePlan(args: string[]): Promise<number> {
        const options = this.parseOptions(args);
        const report = await this.orchestrator(options).plan(this.buildRequest(options));
        this.write(options.json ? JSON.stringify(report, null, 2) : renderPlanText(report, options.verbose));
        return EXIT_SUCCESS;
    }

    private async handleDumpGraph(args: string[]): Promise<number> {
        const options = this.parseOptions(args);
        const format = options.format ?? (options.json ? 'json' : 'text');
        if (!isGraphFormat(format)) {
            throw new ConfigError('CLI', 'format', `--format must be text, json or dot, got '${format}'`);
        }
        const report = await this.orchestrator(options).dumpGraph(this.buildRequest(options));
        this.write(renderGraph(report, format));
        return EXIT_SUCCESS;
    }

    private async handleValidate(args: string[]): Promise<number> {
        const options = this.parseOptions(args);
        const report = await this.orchestrator(options).validate(this.buildRequest(options));

        if (options.json) {
            this.write(JSON.stringify(report, null, 2));
            return EXIT_SUCCESS;
        }

        this.write(`✅ Catalog is valid for ${report.environment}`);
        this.write(`   Stacks: ${report.totalStacks} (${report.disabledStacks.length} disabled)`);
        this.write(`   Selected: ${report.selectedStacks.length} in ${report.batches} batch(es)`);
        this.write(`   Version sources: ${report.versionSources.length > 0 ? report.versionSources.join(', ') : 'none'}`);
        if (report.unusedGlobals.length > 0) {
            this.write(`   Unused globals: ${report.unusedGlobals.join(', ')}`);
        }
        return EXIT_SUCCESS;
    }

    private async handleUpdateVersions(args: string[]): Promise<number> {
        const options = this.parseOptions(args);
        if (!options.versionsFile || !options.repo) {
            throw new ConfigError('CLI', 'update-versions', '--versions-file and --repo are required');
        }
        if ((options.sha === undefined) === (options.manifestUrl === undefined)) {
            throw new ConfigError('CLI', 'update-versions', 'Exactly one of --sha or --manifest-url is required');
        }

        const settings = this.settings(options);
        const updater = new VersionsFileUpdater(options.versionsFile, {
            s3: options.manifestUrl?.startsWith('s3://') ? createAwsClients(settings.region).s3 : undefined
        });

        const changed = options.sha !== undefined
            ? updater.updateRepoVersion(options.repo, options.sha)
            : await updater.updateArtifactVersions(options.repo, options.manifestUrl ?? '');

        this.write(changed ? `Updated ${options.versionsFile}` : `No update needed for ${options.repo}`);
        return EXIT_SUCCESS;
    }

    private orchestrator(options: CliOptions): DeploymentOrchestrator {
        const settings = this.settings(options);
        return this.options.createOrchestrator
            ? this.options.createOrchestrator(settings)
            : new DeploymentOrchestrator({ settings, env: this.options.env });
    }

    /**
     * Environment settings with command-line overrides applied
     */
    private settings(options: CliOptions): OrchestratorSettings {
        const settings = loadSettings(this.options.env ?? process.env);
        if (options.stateBackend !== undefined && !isStateBackend(options.stateBackend)) {
            throw new ConfigError('CLI', 'state-backend', `--state-backend must be 'file' or 'cloudformation', got '${options.stateBackend}'`);
        }
        return {
            ...settings,
            functionName: options.functionName ?? settings.functionName,
            region: options.region ?? settings.region,
            stateBackend: options.stateBackend !== undefined && isStateBackend(options.stateBackend)
                ? options.stateBackend
                : settings.stateBackend,
            stateDirectory: options.stateDir ?? settings.stateDirectory
        };
    }

    private buildRequest(options: CliOptions): OrchestrationRequest {
        if (!options.config) {
            throw new ConfigError('CLI', 'config', '--config <catalog> is required');
        }
        if (!fs.existsSync(options.config)) {
            throw new ConfigError('CLI', 'config', `Configuration file not found: ${options.config}`);
        }

        return {
            catalogPath: options.config,
            versionFiles: options.versions,
            stack: options.stack,
            dryRun: options.dryRun,
            force: options.force,
            maxParallel: this.parsePositive(options.maxParallel, 'max-parallel'),
            failFast: options.failFast ? true : undefined,
            timeoutSeconds: this.parsePositive(options.timeout, 'timeout'),
            externalDependencies: options.assumeExternalDeployed ? 'assume-deployed' : undefined,
            overrideGlobalsFile: options.overrideGlobalsFile,
            metricsFile: options.metricsFile,
            signal: this.options.signal,
            verbose: options.verbose
        };
    }

    private parsePositive(value: string | undefined, flag: string): number | undefined {
        if (value === undefined) {
            return undefined;
        }
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < 1) {
            throw new ConfigError('CLI', flag, `--${flag} must be a positive integer, got '${value}'`);
        }
        return parsed;
    }

    private parseOptions(args: string[]): CliOptions {
        const options: CliOptions = {
            versions: [],
            dryRun: false,
            force: false,
            failFast: false,
            assumeExternalDeployed: false,
            json: false,
            verbose: false
        };
        const issues: string[] = [];

        for (let i = 0; i < args.length; i++) {
            const arg = args[i];
            if (!arg.startsWith('--')) {
                issues.push(`Unexpected argument: ${arg}`);
                continue;
            }

            const key = arg.slice(2);
            const valueOption = VALUE_OPTIONS.get(key);
            const flagOption = FLAG_OPTIONS.get(key);
            if (key === 'versions' || valueOption !== undefined) {
                const value = args[i + 1];
                if (value === undefined || value.startsWith('--')) {
                    issues.push(`--${key} requires a value`);
                    continue;
                }
                i++; // Skip the value
                if (valueOption !== undefined) {
                    options[valueOption] = value;
                } else {
                    options.versions.push(value);
                }
            } else if (flagOption !== undefined) {
                options[flagOption] = true;
            } else {
                issues.push(`Unknown option: ${arg}`);
            }
        }

        if (issues.length > 0) {
            throw new ConfigError('CLI', 'arguments', issues);
        }
        return options;
    }

    private printHelp(): void {
        this.write(`
Stack Orchestrator CLI - dependency-ordered CloudFormation deployments

Usage:
  stack-orchestrator <command> [options]

Commands:
  deploy              Deploy the stacks of a catalog in dependency order
  plan | dump         Show the deployment batches without deploying
  dump-graph          Show the dependency graph (text, json or dot)
  validate            Run every check that precedes a deployment
  update-versions     Record a new repository or artifact version in a versions file
  help                Show this help message

Options:
  --config <path>                 Stack catalog for one environment
  --versions <path>               Versions file, consulted before the catalog's (repeatable)
  --stack <name>                  Deploy one stack, by base name or full name
  --dry-run                       Report what would be deployed without deploying
  --force                         Deploy even when nothing changed
  --max-parallel <n>              Concurrent deployments within a batch (default: 4)
  --fail-fast                     Stop dispatching new stacks after the first failure
  --timeout <seconds>             Stop dispatching new stacks after this long
  --assume-external-deployed      Treat dependencies outside the selection as deployed
  --function-name <name>          Deployer Lambda function
  --region <region>               AWS region (default: eu-central-2)
  --state-backend <backend>       Where deployed state is read: file or cloudformation
  --state-dir <dir>               Directory of the file state backend
  --override-globals-file <path>  KEY=VALUE file overriding catalog globals
  --metrics-file <path>           Write run metrics as JSON
  --format <format>               Graph output: text, json or dot
  --json                          Machine-readable output
  --verbose                       Debug logging and parameter values in plans
  --versions-file <path>          Versions file to update
  --repo <name>                   Repository to update
  --sha <sha>                     Commit SHA of the repository
  --manifest-url <url>            Build manifest (s3:// or local path) with artifact versions

Exit codes:
  0  success
  1  configuration or validation error
  2  at least one stack failed
  3  stacks were aborted, none failed

Examples:
  # Deploy everything in staging
  stack-orchestrator deploy --config catalogs/staging/catalog.yaml --versions versions.yaml

  # Deploy a single stack, by either of its names
  stack-orchestrator deploy --config catalogs/staging/catalog.yaml --stack billing-role
  stack-orchestrator deploy --config catalogs/staging/catalog.yaml --stack billing-role-staging

  # Preview the batches with parameter values
  stack-orchestrator plan --config catalogs/staging/catalog.yaml --verbose

  # Render the graph with Graphviz
  stack-orchestrator dump-graph --config catalogs/staging/catalog.yaml --format dot | dot -Tpng > graph.png

  # Record a new commit
  stack-orchestrator update-versions --versions-file versions.yaml --repo service-api --sha 4f2a9c1
        `);
    }
}

// Run CLI if this file is executed directly
if (require.main === module) {
    if (fs.existsSync('.env')) {
        dotenv.config();
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const cli = new AutomationCLI({ signal: controller.signal });
    cli.run(process.argv.slice(2))
        .then(code => {
            process.exit(code);
        })
        .catch(error => {
            console.error(error);
            process.exit(EXIT_CONFIG_ERROR);
        });
}

export { AutomationCLI };
