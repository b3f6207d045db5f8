import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import type { ExampleIdentifier, ProbeMatch } from '../../src/types/index.js';
import { parseExampleIdentifier } from '../../src/core/resolution/example-identifier.js';
import {
  compiledClassProbe,
  packageProbe,
  sourceProbe,
  toRootRelative,
  type ModuleProbe,
  type ProbeConfig
} from '../../src/core/resolution/module-probes.js';
import { resolveModule, toModuleName } from '../../src/core/resolution/module-resolver.js';
import { ModuleNotFoundError } from '../../src/utils/errors.js';
import { createTree, makeConfig, removeTree } from '../test-helpers.js';

const SCALA = 'examples/src/main/scala/org/apache/spark/examples';

let root: string;
let config: ProbeConfig;

function id(raw: string): ExampleIdentifier {
  return parseExampleIdentifier(raw, { scriptExtension: '.py' });
}

before(async () => {
  root = await createTree([
    `examples/src/main/scala/org/apache/spark/examples/stray/Stray.scala`,
    `sql-streaming-mqtt/${SCALA}/sql/streaming/mqtt/MQTTStreamWordCount.scala`,
    `streaming-akka/${SCALA}/akka/ActorWordCount.scala`,
    `streaming-akka/target/scala-2.12/test-classes/org/apache/spark/examples/akka/ActorWordCount$Helper.class`,
    `streaming-akka/target/scala-2.12/test-classes/org/apache/spark/examples/akka/ActorWordCount.class`,
    `streaming-mqtt/${SCALA}/mqtt/MQTTPublisher.scala`,
    `streaming-mqtt/${SCALA}/sql/streaming/mqtt/MQTTStreamWordCount.scala`,
    'streaming-mqtt/examples/src/main/python/mqtt_wordcount.py',
    'streaming-zeromq/target/classes/org/apache/spark/examples/zeromq/ZeroMQWordCount$.class',
    'connectors/streaming-twitter/examples/src/main/java/org/apache/spark/examples/twitter/TwitterPopularTags.java'
  ]);
  config = makeConfig(root);
});

after(async () => {
  await removeTree(root);
});

describe('toRootRelative / toModuleName', () => {
  it('uses forward slashes relative to the root', () => {
    assert.equal(toRootRelative(root, path.join(root, 'a', 'b')), '/a/b');
    assert.equal(toModuleName(root, path.join(root, 'connectors', 'streaming-twitter')), 'connectors/streaming-twitter');
  });
});

describe('sourceProbe', () => {
  it('matches a class whose path appears verbatim under examples/src', async () => {
    const match = await sourceProbe.probe(id('org.apache.spark.examples.akka.ActorWordCount'), config);
    assert.deepEqual(match, {
      probe: 'source',
      matchedPath: path.join(root, 'streaming-akka', ...SCALA.split('/'), 'akka', 'ActorWordCount.scala'),
      modulePath: path.join(root, 'streaming-akka')
    });
  });

  it('takes the first module in lexical order when several match', async () => {
    const match = await sourceProbe.probe(id('org.apache.spark.examples.sql.streaming.mqtt.MQTTStreamWordCount'), config);
    assert.equal(match?.modulePath, path.join(root, 'sql-streaming-mqtt'));
  });

  it('ignores matches directly under the project root', async () => {
    const match = await sourceProbe.probe(id('org.apache.spark.examples.stray.Stray'), config);
    assert.equal(match, undefined);
  });

  it('matches script paths without converting dots', async () => {
    const match = await sourceProbe.probe(id('streaming-mqtt/examples/src/main/python/mqtt_wordcount.py'), config);
    assert.equal(match?.modulePath, path.join(root, 'streaming-mqtt'));
  });

  it('accepts an absolute script path inside the project', async () => {
    const absolute = path.join(root, 'streaming-mqtt', 'examples', 'src', 'main', 'python', 'mqtt_wordcount.py');
    const match = await sourceProbe.probe(id(absolute), config);
    assert.equal(match?.matchedPath, absolute);
  });

  it('derives nested module paths', async () => {
    const match = await sourceProbe.probe(id('org.apache.spark.examples.twitter.TwitterPopularTags'), config);
    assert.equal(match?.modulePath, path.join(root, 'connectors', 'streaming-twitter'));
  });
});

describe('compiledClassProbe', () => {
  it('reads $ in class file names as a nesting separator', async () => {
    const match = await compiledClassProbe.probe(id('org.apache.spark.examples.akka.ActorWordCount.Helper'), config);
    assert.equal(match?.probe, 'compiled-class');
    assert.equal(match?.modulePath, path.join(root, 'streaming-akka'));
    assert.equal(path.basename(match?.matchedPath ?? ''), 'ActorWordCount$Helper.class');
  });

  it('matches object classes ending in $', async () => {
    const match = await compiledClassProbe.probe(id('org.apache.spark.examples.zeromq.ZeroMQWordCount'), config);
    assert.equal(match?.modulePath, path.join(root, 'streaming-zeromq'));
  });

  it('does not match a longer class name sharing the prefix', async () => {
    const match = await compiledClassProbe.probe(id('org.apache.spark.examples.akka.ActorWord'), config);
    assert.equal(match, undefined);
  });

  it('never applies to scripts', async () => {
    const match = await compiledClassProbe.probe(id('streaming-mqtt/examples/src/main/python/mqtt_wordcount.py'), config);
    assert.equal(match, undefined);
  });
});

describe('packageProbe', () => {
  it('searches the package portion of the identifier', async () => {
    const match = await packageProbe.probe(id('org.apache.spark.examples.mqtt.MQTTPublisher.Settings'), config);
    assert.equal(match?.probe, 'package');
    assert.equal(match?.modulePath, path.join(root, 'streaming-mqtt'));
  });

  it('has nothing to search for a bare name', async () => {
    assert.equal(await packageProbe.probe(id('Standalone'), config), undefined);
  });
});

describe('resolveModule', () => {
  it('stops at the source probe when the path matches verbatim', async () => {
    let laterProbeCalls = 0;
    const spy: ModuleProbe = {
      name: 'compiled-class',
      async probe(): Promise<ProbeMatch | undefined> {
        laterProbeCalls++;
        return undefined;
      }
    };

    const module = await resolveModule(id('org.apache.spark.examples.akka.ActorWordCount'), config, [sourceProbe, spy]);
    assert.equal(module.probe, 'source');
    assert.equal(module.moduleName, 'streaming-akka');
    assert.equal(module.modulePath, path.join(root, 'streaming-akka'));
    assert.equal(laterProbeCalls, 0);
  });

  it('falls back to compiled classes for nested classes', async () => {
    const module = await resolveModule(id('org.apache.spark.examples.akka.ActorWordCount.Helper'), config);
    assert.equal(module.probe, 'compiled-class');
    assert.equal(module.moduleName, 'streaming-akka');
  });

  it('falls back to the package when neither source nor classes match', async () => {
    const module = await resolveModule(id('org.apache.spark.examples.mqtt.MQTTPublisher.Settings'), config);
    assert.equal(module.probe, 'package');
    assert.equal(module.moduleName, 'streaming-mqtt');
  });

  it('throws ModuleNotFoundError when every probe misses', async () => {
    await assert.rejects(
      resolveModule(id('com.example.missing.Nothing'), config),
      (error: unknown) => {
        assert.ok(error instanceof ModuleNotFoundError);
        assert.equal(error.message, "Could not find module for example 'com.example.missing.Nothing'");
        return true;
      }
    );
  });
});
