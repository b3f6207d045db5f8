import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { runExamplePipeline } from '../../src/core/run-example-pipeline.js';
import { ArtifactNotFoundError, ModuleNotFoundError, PreconditionError, VersionUnavailableError } from '../../src/utils/errors.js';
import { AVAILABLE_VERSIONS, createFakeRunContext, createTree, removeTree } from '../test-helpers.js';

const SCALA = 'examples/src/main/scala/org/apache/spark/examples';
const AKKA_COORDINATE = 'org.apache.bahir:spark-streaming-akka_2.12:2.4.0-SNAPSHOT';

let project: string;
let runtime: string;
let submit: string;

before(async () => {
  project = await createTree([
    'pom.xml',
    'connectors/pom.xml',
    'connectors/streaming-twitter/pom.xml',
    `connectors/streaming-twitter/${SCALA}/twitter/TwitterPopularTags.scala`,
    'connectors/streaming-twitter/target/spark-streaming-twitter_2.12-2.4.0-SNAPSHOT-tests.jar',
    'streaming-akka/pom.xml',
    `streaming-akka/${SCALA}/akka/ActorWordCount.scala`,
    'streaming-akka/target/spark-streaming-akka_2.12-2.4.0-SNAPSHOT-tests.jar',
    'streaming-mqtt/pom.xml',
    'streaming-mqtt/examples/src/main/python/mqtt_wordcount.py',
    'streaming-mqtt/python/',
    'streaming-mqtt/target/spark-streaming-mqtt_2.12-2.4.0-SNAPSHOT-tests.jar',
    'streaming-zeromq/pom.xml',
    `streaming-zeromq/${SCALA}/zeromq/ZeroMQWordCount.scala`
  ]);
  runtime = await createTree(['bin/spark-submit'], 'run-example-runtime-');
  submit = path.join(runtime, 'bin', 'spark-submit');
});

after(async () => {
  await removeTree(project);
  await removeTree(runtime);
});

describe('runExamplePipeline', () => {
  it('submits a class example with the tests jar and the example arguments', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);
    const jar = path.join(project, 'streaming-akka', 'target', 'spark-streaming-akka_2.12-2.4.0-SNAPSHOT-tests.jar');

    const result = await runExamplePipeline(
      'org.apache.spark.examples.akka.ActorWordCount',
      ['localhost', '9999'],
      { projectRoot: project },
      ctx
    );

    const expectedArgs = [
      '--packages',
      AKKA_COORDINATE,
      '--class',
      'org.apache.spark.examples.akka.ActorWordCount',
      jar,
      'localhost',
      '9999'
    ];
    assert.equal(result.success, true);
    assert.equal(result.data?.exitCode, 0);
    assert.equal(result.data?.coordinate, AKKA_COORDINATE);
    assert.equal(ctx.launched.length, 1);
    assert.equal(ctx.launched[0]?.command, submit);
    assert.deepEqual(ctx.launched[0]?.args, expectedArgs);
    assert.deepEqual(ctx.output.messages, [[submit, ...expectedArgs].join(' ')]);
    assert.deepEqual(ctx.metadataQuery.calls, [
      { expression: 'project.version', modulePath: path.join(project, 'streaming-akka') },
      { expression: 'scala.binary.version', modulePath: path.join(project, 'streaming-akka') }
    ]);
  });

  it('names a nested module by its last segment in the coordinate', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);

    const result = await runExamplePipeline(
      'org.apache.spark.examples.twitter.TwitterPopularTags',
      [],
      { projectRoot: project, dryRun: true },
      ctx
    );

    assert.equal(result.data?.coordinate, 'org.apache.bahir:spark-streaming-twitter_2.12:2.4.0-SNAPSHOT');
    assert.deepEqual(result.data?.action.args.slice(-1), [
      path.join(project, 'connectors', 'streaming-twitter', 'target', 'spark-streaming-twitter_2.12-2.4.0-SNAPSHOT-tests.jar')
    ]);
    assert.deepEqual(ctx.metadataQuery.calls.map(call => call.modulePath), [
      path.join(project, 'connectors', 'streaming-twitter'),
      path.join(project, 'connectors', 'streaming-twitter')
    ]);
  });

  it('submits a script example with every script root on the search path', async () => {
    const script = 'streaming-mqtt/examples/src/main/python/mqtt_wordcount.py';
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);

    await runExamplePipeline(script, ['tcp://localhost:1883', 'foo'], { projectRoot: project }, ctx);

    const action = ctx.launched[0];
    assert.ok(action);
    assert.deepEqual(action.args, [
      '--packages',
      'org.apache.bahir:spark-streaming-mqtt_2.12:2.4.0-SNAPSHOT',
      path.join(project, ...script.split('/')),
      'tcp://localhost:1883',
      'foo'
    ]);
    assert.equal(
      action.env.PYTHONPATH,
      [
        path.join(project, 'streaming-mqtt', 'examples', 'src', 'main', 'python'),
        path.join(project, 'streaming-mqtt', 'python')
      ].join(path.delimiter)
    );
    assert.equal(action.env.SPARK_HOME, runtime);
  });

  it('prints the command without launching on a dry run', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);

    const result = await runExamplePipeline(
      'org.apache.spark.examples.akka.ActorWordCount',
      [],
      { projectRoot: project, dryRun: true },
      ctx
    );

    assert.equal(result.success, true);
    assert.equal(result.data?.exitCode, undefined);
    assert.equal(ctx.launched.length, 0);
    assert.equal(ctx.output.messages.length, 1);
    assert.equal(ctx.output.lines.at(-1), 'info Dry run: not launching');
  });

  it('reports the exit status of the submission tool', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS, 3);

    const result = await runExamplePipeline('org.apache.spark.examples.akka.ActorWordCount', [], { projectRoot: project }, ctx);

    assert.equal(result.success, false);
    assert.equal(result.data?.exitCode, 3);
  });

  it('stops before anything else when SPARK_HOME is not set', async () => {
    const ctx = createFakeRunContext({}, project, AVAILABLE_VERSIONS);

    await assert.rejects(
      runExamplePipeline('org.apache.spark.examples.akka.ActorWordCount', [], { projectRoot: project }, ctx),
      PreconditionError
    );
    assert.equal(ctx.metadataQuery.calls.length, 0);
    assert.equal(ctx.launched.length, 0);
  });

  it('does not query the build tool when no module matches', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);

    await assert.rejects(runExamplePipeline('com.example.Missing', [], { projectRoot: project }, ctx), ModuleNotFoundError);
    assert.equal(ctx.metadataQuery.calls.length, 0);
    assert.equal(ctx.launched.length, 0);
    assert.deepEqual(ctx.output.messages, []);
  });

  it('does not query the build tool when the tests jar is missing', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, AVAILABLE_VERSIONS);

    await assert.rejects(
      runExamplePipeline('org.apache.spark.examples.zeromq.ZeroMQWordCount', [], { projectRoot: project }, ctx),
      ArtifactNotFoundError
    );
    assert.equal(ctx.metadataQuery.calls.length, 0);
    assert.equal(ctx.launched.length, 0);
  });

  it('does not launch when a version is unavailable', async () => {
    const ctx = createFakeRunContext({ SPARK_HOME: runtime }, project, {
      'project.version': { status: 'available', value: '2.4.0-SNAPSHOT' }
    });

    await assert.rejects(
      runExamplePipeline('org.apache.spark.examples.akka.ActorWordCount', [], { projectRoot: project }, ctx),
      VersionUnavailableError
    );
    assert.equal(ctx.launched.length, 0);
    assert.deepEqual(ctx.output.messages, []);
  });
});
