import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigurationError } from '../src/errors.js';
import { parseClientArgs, resolveTarget } from '../src/client/args.js';

describe('client arguments', () => {
  describe('parseClientArgs', () => {
    it('should default the command to /', () => {
      assert.deepStrictEqual(parseClientArgs(['localhost:8080']), {
        target: 'localhost:8080',
        command: '/',
        showHelp: false,
      });
    });

    it('should add a leading slash to the command', () => {
      assert.strictEqual(parseClientArgs(['localhost:8080', 'files/list?path=/tmp']).command, '/files/list?path=/tmp');
      assert.strictEqual(parseClientArgs(['localhost:8080', '/info']).command, '/info');
    });

    it('should read the output file in either form', () => {
      assert.strictEqual(parseClientArgs(['host', '/screenshot', '-o', 'shot.png']).outputFile, 'shot.png');
      assert.strictEqual(parseClientArgs(['--output', 'info.json', 'host', '/info']).outputFile, 'info.json');
    });

    it('should read the help flag', () => {
      assert.strictEqual(parseClientArgs(['-h']).showHelp, true);
      assert.strictEqual(parseClientArgs(['--help']).target, '');
    });

    it('should reject unknown options', () => {
      assert.throws(() => parseClientArgs(['host', '--verbose']), TypeError);
    });
  });

  describe('resolveTarget', () => {
    it('should add http:// to host:port', () => {
      assert.deepStrictEqual(resolveTarget('localhost:8080'), { kind: 'http', baseUrl: 'http://localhost:8080' });
    });

    it('should keep an explicit scheme and drop trailing slashes', () => {
      assert.deepStrictEqual(resolveTarget('https://10.0.0.5:8443/'), { kind: 'http', baseUrl: 'https://10.0.0.5:8443' });
    });

    it('should treat p2p: and multiaddrs as P2P', () => {
      const address = '/ip4/192.168.1.20/tcp/4001/p2p/12D3KooWTestPeer';
      assert.deepStrictEqual(resolveTarget(`p2p:${address}`), { kind: 'p2p', address });
      assert.deepStrictEqual(resolveTarget(address), { kind: 'p2p', address });
    });

    it('should require a target', () => {
      assert.throws(() => resolveTarget(''), ConfigurationError);
    });
  });
});
