import { use as chaiUse, expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import fs from 'fs';
import sinon from 'sinon';
import { parse as yamlParse } from 'yaml';

import {
  ConfigurationInvalidError,
  OperationFailedError,
  ProcessExecutionError,
} from '../errors.js';
import { CommandRunner } from '../runner/CommandRunner.js';
import {
  FakeProcessExecutor,
  OWNER,
  TOKEN,
  buildCoreConfig,
  buildOperatorConfig,
  buildWarpRouteConfig,
  captureRejection,
  silentLogger,
  toBytes,
} from '../test/fixtures.js';

import {
  OperatorStage,
  WarpRouteOperator,
  operateWarpRoute,
} from './WarpRouteOperator.js';

chaiUse(chaiAsPromised);

const FRESH_COMMANDS = [
  'hyperlane registry init --yes',
  `hyperlane core init --advanced --config '/tmp/warp/core-config.yaml' --yes`,
  `hyperlane core deploy --config '/tmp/warp/core-config.yaml' --yes`,
  `hyperlane warp deploy --config '/tmp/warp/warp-route-deployment.yaml' --yes`,
  'hyperlane core read --chain holesky --yes',
  `hyperlane core apply --chain holesky --input 'ABC123' --yes`,
  'hyperlane core read --chain tangletestnet --yes',
  `hyperlane core apply --chain tangletestnet --input 'DEF456' --yes`,
];

describe('WarpRouteOperator', () => {
  let mkdirStub: sinon.SinonStub;
  let writeFileStub: sinon.SinonStub;

  beforeEach(() => {
    mkdirStub = sinon.stub(fs, 'mkdirSync');
    writeFileStub = sinon.stub(fs, 'writeFileSync');
  });

  afterEach(() => {
    sinon.restore();
  });

  function createOperator(
    executor: FakeProcessExecutor,
    options: { deployPolicy?: () => boolean } = {},
  ) {
    return new WarpRouteOperator({
      runner: new CommandRunner(executor, silentLogger),
      config: buildOperatorConfig(),
      logger: silentLogger,
      deployPolicy: options.deployPolicy,
    });
  }

  const readOutputs = {
    'core read --chain holesky': 'ABC123',
    'core read --chain tangletestnet': 'DEF456',
  };

  it('deploys fresh infrastructure and threads read output into apply', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);

    const report = await operator.operate({
      warpRouteConfig: toBytes(buildWarpRouteConfig()),
      advanced: true,
    });

    expect(executor.commandLines).to.deep.equal(FRESH_COMMANDS);
    expect(report).to.deep.include({
      status: 0,
      infraMode: 'fresh',
      deployed: true,
      reconciledChains: ['holesky', 'tangletestnet'],
      stages: [
        OperatorStage.InfraSetup,
        OperatorStage.RouteInit,
        OperatorStage.RouteDeployDecision,
        OperatorStage.PerChainReconcile,
        OperatorStage.Done,
      ],
    });
    expect(report.outputs['core read --chain holesky']).to.equal('ABC123');
  });

  it('writes the validated warp route config before deploying', async () => {
    const operator = createOperator(new FakeProcessExecutor(readOutputs));

    await operator.operate({
      warpRouteConfig: toBytes(buildWarpRouteConfig()),
      advanced: false,
    });

    expect(mkdirStub.calledOnceWith('/tmp/warp', { recursive: true })).to.be
      .true;
    expect(writeFileStub.calledOnce).to.be.true;
    const [filePath, contents] = writeFileStub.firstCall.args;
    expect(filePath).to.equal('/tmp/warp/warp-route-deployment.yaml');
    const written = yamlParse(new TextDecoder().decode(contents));
    expect(written.holesky.token).to.equal(TOKEN);
    expect(written.tangletestnet).to.not.have.property('token');
  });

  it('reuses an existing core config without the init template', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);

    const report = await operator.operate({
      warpRouteConfig: toBytes(buildWarpRouteConfig()),
      advanced: false,
      existingCoreConfig: toBytes(buildCoreConfig()),
    });

    expect(report.infraMode).to.equal('reuse');
    expect(executor.commandLines.slice(0, 3)).to.deep.equal([
      'hyperlane registry init --yes',
      'hyperlane core init --yes',
      'hyperlane core deploy --yes',
    ]);
    expect(executor.calls).to.have.lengthOf(8);
  });

  it('treats an empty core config payload as a fresh deployment', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);

    const report = await operator.operate({
      warpRouteConfig: toBytes(buildWarpRouteConfig()),
      advanced: true,
      existingCoreConfig: new Uint8Array(),
    });

    expect(report.infraMode).to.equal('fresh');
    expect(executor.commandLines).to.deep.equal(FRESH_COMMANDS);
  });

  it('runs nothing when the existing core config is invalid', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);
    const coreConfig = { ...buildCoreConfig(), owner: '0x1234' };

    const error = await captureRejection(
      operator.operate({
        warpRouteConfig: toBytes(buildWarpRouteConfig()),
        advanced: false,
        existingCoreConfig: toBytes(coreConfig),
      }),
    );

    expect(error).to.be.instanceOf(ConfigurationInvalidError);
    expect(error).to.include({ document: 'core' });
    expect(executor.calls).to.be.empty;
    expect(writeFileStub.called).to.be.false;
  });

  for (const protocolFee of ['abc', '1.5', '1e3']) {
    it(`rejects a malformed protocol fee "${protocolFee}" as invalid configuration`, async () => {
      const executor = new FakeProcessExecutor(readOutputs);
      const operator = createOperator(executor);
      const coreConfig = buildCoreConfig();
      coreConfig.requiredHook.protocolFee = protocolFee;

      const error = await captureRejection(
        operator.operate({
          warpRouteConfig: toBytes(buildWarpRouteConfig()),
          advanced: false,
          existingCoreConfig: toBytes(coreConfig),
        }),
      );

      expect(error).to.be.instanceOf(ConfigurationInvalidError);
      expect(error).to.include({ document: 'core' });
      expect(executor.calls).to.be.empty;
    });
  }

  it('runs nothing when the warp route config is invalid', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);

    await expect(
      operator.operate({
        warpRouteConfig: new Uint8Array([0x00, 0x9f, 0x92, 0x96]),
        advanced: false,
      }),
    ).to.be.rejectedWith(
      ConfigurationInvalidError,
      'Invalid warpRoute configuration: Invalid UTF-8 in warp route config input',
    );
    expect(executor.calls).to.be.empty;
  });

  it('stops at the failing step and skips the remaining chains', async () => {
    const executor = new FakeProcessExecutor(readOutputs, {
      'core apply --chain holesky': new ProcessExecutionError(
        'core apply --chain holesky',
        `hyperlane core apply --chain holesky --input 'ABC123' --yes`,
        'exited with code 1',
        1,
      ),
    });
    const operator = createOperator(executor);

    const error = await captureRejection(
      operator.operate({
        warpRouteConfig: toBytes(buildWarpRouteConfig()),
        advanced: true,
      }),
    );

    expect(error).to.be.instanceOf(OperationFailedError);
    expect(error).to.include({
      stage: OperatorStage.PerChainReconcile,
      step: 'core apply --chain holesky',
      message:
        'Warp route operation failed at PerChainReconcile (core apply --chain holesky): Command "core apply --chain holesky" failed: exited with code 1',
    });
    expect(executor.commandLines).to.deep.equal(FRESH_COMMANDS.slice(0, 6));
  });

  it('reports an infrastructure failure without touching the route', async () => {
    const executor = new FakeProcessExecutor(readOutputs, {
      'core deploy': new Error('spawn hyperlane ENOENT'),
    });
    const operator = createOperator(executor);

    const error = await captureRejection(
      operator.operate({
        warpRouteConfig: toBytes(buildWarpRouteConfig()),
        advanced: true,
      }),
    );

    expect(error).to.include({
      stage: OperatorStage.InfraSetup,
      step: 'core deploy',
    });
    expect(writeFileStub.called).to.be.false;
    expect(executor.calls).to.have.lengthOf(3);
  });

  it('fails the route init stage when the config cannot be written', async () => {
    writeFileStub.throws(new Error('EACCES: permission denied'));
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor);

    const error = await captureRejection(
      operator.operate({
        warpRouteConfig: toBytes(buildWarpRouteConfig()),
        advanced: true,
      }),
    );

    expect(error).to.include({
      stage: OperatorStage.RouteInit,
      step: 'write warp route config',
    });
    expect(executor.calls).to.have.lengthOf(3);
  });

  it('skips warp deploy when the deploy policy declines', async () => {
    const executor = new FakeProcessExecutor(readOutputs);
    const operator = createOperator(executor, { deployPolicy: () => false });

    const report = await operator.operate({
      warpRouteConfig: toBytes(buildWarpRouteConfig()),
      advanced: true,
    });

    expect(report.deployed).to.be.false;
    expect(executor.commandLines).to.deep.equal([
      ...FRESH_COMMANDS.slice(0, 3),
      ...FRESH_COMMANDS.slice(4),
    ]);
  });

  describe('operateWarpRoute', () => {
    it('resolves status 0 on success', async () => {
      const operator = createOperator(new FakeProcessExecutor(readOutputs));

      const status = await operateWarpRoute(
        operator,
        toBytes(buildWarpRouteConfig()),
        false,
        toBytes({ ...buildCoreConfig(), owner: OWNER }),
      );

      expect(status).to.equal(0);
    });
  });
});
