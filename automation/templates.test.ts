import * as path from 'path';
import { ConfigError } from '../shared/utils/error-handling';
import { TempDir } from '../tests/test-utils';
import { findTemplate, hashTemplate, loadTemplate, parseTemplate, searchEnvironments } from './templates';

const PRIORITY = ['development', 'staging', 'production', 'devops'];

const QUEUE_TEMPLATE = [
    'AWSTemplateFormatVersion: "2010-09-09"',
    'Parameters:',
    '  QueueName:',
    '    Type: String',
    '  RetentionSeconds:',
    '    Type: Number',
    '    Default: 345600',
    'Resources:',
    '  Queue:',
    '    Type: AWS::SQS::Queue',
    '    Properties:',
    '      QueueName: !Ref QueueName',
    '      MessageRetentionPeriod: !Ref RetentionSeconds',
    'Outputs:',
    '  QueueArn:',
    '    Value: !GetAtt Queue.Arn',
    '  QueueUrl:',
    '    Value: !Sub "https://${Queue}"',
    '  Zones:',
    '    Value: !Join [",", !GetAZs ""]'
].join('\n');

describe('templates', () => {
    describe('searchEnvironments', () => {
        it('should search the environment and every later one', () => {
            expect(searchEnvironments('staging', PRIORITY)).toEqual(['staging', 'production', 'devops']);
            expect(searchEnvironments('devops', PRIORITY)).toEqual(['devops']);
        });

        it('should search only an environment missing from the priority list', () => {
            expect(searchEnvironments('sandbox', PRIORITY)).toEqual(['sandbox']);
        });
    });

    describe('parseTemplate', () => {
        it('should read declared and optional parameters', () => {
            const info = parseTemplate(QUEUE_TEMPLATE, { path: '/t/staging/queue.yaml', sourceEnvironment: 'staging' });

            expect(info.fileName).toBe('queue.yaml');
            expect(info.sourceEnvironment).toBe('staging');
            expect(info.declaredParameters).toEqual(['QueueName', 'RetentionSeconds']);
            expect(info.optionalParameters).toEqual(['RetentionSeconds']);
            expect(info.hash).toBe(hashTemplate(QUEUE_TEMPLATE));
            expect(info.hash).toMatch(/^[0-9a-f]{64}$/);
        });

        it('should accept a template without parameters', () => {
            const info = parseTemplate('Resources:\n  Topic:\n    Type: AWS::SNS::Topic\n', {
                path: '/t/topic.yaml',
                sourceEnvironment: 'staging'
            });

            expect(info.declaredParameters).toEqual([]);
        });

        it('should reject an empty template', () => {
            expect(() => parseTemplate('# nothing here\n', { path: '/t/empty.yaml', sourceEnvironment: 'staging' })).toThrow(
                'Template file /t/empty.yaml is empty or contains only comments'
            );
        });

        it('should reject a template that is not a mapping', () => {
            expect(() => parseTemplate('- one\n- two\n', { path: '/t/list.yaml', sourceEnvironment: 'staging' })).toThrow(
                'Template file /t/list.yaml does not contain a CloudFormation template mapping'
            );
        });

        it('should reject invalid YAML', () => {
            expect(() => parseTemplate('Resources: [unclosed', { path: '/t/bad.yaml', sourceEnvironment: 'staging' })).toThrow(
                ConfigError
            );
        });

        it('should reject parameters that are not a mapping', () => {
            expect(() => parseTemplate('Parameters: [a]\n', { path: '/t/p.yaml', sourceEnvironment: 'staging' })).toThrow(
                'Template /t/p.yaml Parameters must be a mapping'
            );
        });
    });

    describe('findTemplate and loadTemplate', () => {
        let dir: TempDir;
        let catalogDirectory: string;

        beforeEach(() => {
            dir = new TempDir('templates-');
            catalogDirectory = dir.path('staging');
            dir.write('staging/catalog.yaml', 'environment: staging\n');
            dir.write('staging/queue.yaml', QUEUE_TEMPLATE);
            dir.write('production/queue.yaml', 'Parameters: {}\n');
            dir.write('production/shared.yaml', 'Parameters:\n  Name:\n    Type: String\n');
        });

        afterEach(() => {
            dir.remove();
        });

        it('should prefer the environment of the catalog', () => {
            expect(findTemplate(catalogDirectory, 'queue.yaml', 'staging', PRIORITY)).toEqual({
                path: path.join(dir.root, 'staging', 'queue.yaml'),
                sourceEnvironment: 'staging'
            });
        });

        it('should fall back to later environments', () => {
            const info = loadTemplate(catalogDirectory, 'shared.yaml', 'staging', PRIORITY);

            expect(info.sourceEnvironment).toBe('production');
            expect(info.declaredParameters).toEqual(['Name']);
        });

        it('should never fall back to earlier environments', () => {
            dir.write('development/dev-only.yaml', 'Parameters: {}\n');

            expect(() => findTemplate(catalogDirectory, 'dev-only.yaml', 'staging', PRIORITY)).toThrow(
                'Template dev-only.yaml not found in any environment of [staging, production, devops]'
            );
        });

        it('should list every path checked', () => {
            expect(() => findTemplate(catalogDirectory, 'missing.yaml', 'production', PRIORITY)).toThrow(
                `checked [${path.join(dir.root, 'production', 'missing.yaml')}, ${path.join(dir.root, 'devops', 'missing.yaml')}]`
            );
        });

        it('should use absolute paths directly', () => {
            const absolute = dir.write('elsewhere/abs.yaml', 'Parameters: {}\n');

            expect(findTemplate(catalogDirectory, absolute, 'staging', PRIORITY)).toEqual({
                path: absolute,
                sourceEnvironment: 'staging'
            });
        });
    });
});
