import { ProbeUsageError } from '../../src/check/errors';
import {
  emptyRawOptions,
  loadOptions,
  mergeOptions,
  parseArgs,
  parseConfigFile,
  renderHelp,
  validateOptions,
} from '../../src/cli/options';

describe('options', () => {
  describe('parseArgs', () => {
    it('should parse short, long and inline options', () => {
      const raw = parseArgs(['-H', 'pve1', '--host=pve2', '-p', 'test-secret', '-m', 'qemu', '-k']);
      expect(raw).toEqual({
        host: ['pve1', 'pve2'],
        warnstr: [],
        critstr: [],
        override: [],
        password: 'test-secret',
        mode: 'qemu',
        insecure: true,
      });
    });

    it('should collect repeatable rules in order', () => {
      const raw = parseArgs(['-o', 'a=1^x^1', '--override', 'a=1^x^2', '-w', 'a=1^l^m']);
      expect(raw.override).toEqual(['a=1^x^1', 'a=1^x^2']);
      expect(raw.warnstr).toEqual(['a=1^l^m']);
    });

    it('should read explicit false values for flags', () => {
      expect(parseArgs(['--insecure=no']).insecure).toBe(false);
      expect(parseArgs(['--debug=1']).debug).toBe(true);
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['--bogus'])).toThrow('Unknown option --bogus');
      expect(() => parseArgs(['-x'])).toThrow("Unexpected argument '-x'");
    });

    it('should reject a missing value', () => {
      expect(() => parseArgs(['-H', 'pve1', '-p'])).toThrow('Option --password requires a value');
    });

    it('should reject positional arguments', () => {
      expect(() => parseArgs(['stray'])).toThrow(ProbeUsageError);
    });
  });

  describe('parseConfigFile', () => {
    it('should read option value lines', () => {
      const raw = parseConfigFile(
        '# cluster\nhost pve1\nhost pve2\n\npassword test-secret\n--mode storage\ninsecure\n',
      );
      expect(raw).toEqual({
        host: ['pve1', 'pve2'],
        warnstr: [],
        critstr: [],
        override: [],
        password: 'test-secret',
        mode: 'storage',
        insecure: true,
      });
    });

    it('should keep spaces inside values', () => {
      expect(parseConfigFile('filter type=qemu node=n1').filter).toBe('type=qemu node=n1');
    });

    it('should name the line of an unknown option', () => {
      expect(() => parseConfigFile('host pve1\nbogus x', 'probe.cfg')).toThrow(
        "Unknown option 'bogus' at probe.cfg:2",
      );
    });
  });

  describe('mergeOptions', () => {
    it('should let the command line win and append repeatable options', () => {
      const file = { ...emptyRawOptions(), host: ['a'], mode: 'node', password: 'test-secret' };
      const cli = { ...emptyRawOptions(), host: ['b'], mode: 'qemu' };

      expect(mergeOptions(file, cli)).toEqual({
        host: ['a', 'b'],
        warnstr: [],
        critstr: [],
        override: [],
        mode: 'qemu',
        password: 'test-secret',
      });
    });
  });

  describe('validateOptions', () => {
    it('should apply defaults and compile rules', () => {
      const options = validateOptions({
        ...emptyRawOptions(),
        host: ['pve1'],
        password: 'test-secret',
        override: ['id=qemu/*^critdisk^80'],
        filter: 'node=n1',
      });

      expect(options).toMatchObject({
        host: ['pve1'],
        username: 'root',
        realm: 'pam',
        port: 8006,
        timeout: 10,
        mode: '',
        insecure: false,
        debug: false,
        verbose: false,
      });
      expect(options.override[0].field).toBe('critdisk');
      expect(options.filter.clauses).toHaveLength(1);
    });

    it('should coerce numeric options', () => {
      const options = validateOptions({
        ...emptyRawOptions(),
        host: ['pve1'],
        password: 'test-secret',
        port: '443',
        timeout: '2.5',
      });
      expect(options.port).toBe(443);
      expect(options.timeout).toBe(2.5);
    });

    it('should require a host and a password', () => {
      expect(() => validateOptions({ ...emptyRawOptions(), host: ['pve1'] })).toThrow(
        'Invalid options: password: --password is required',
      );
      expect(() => validateOptions({ ...emptyRawOptions(), password: 'test-secret' })).toThrow(
        'Invalid options: host: at least one --host is required',
      );
    });

    it('should reject an out-of-range port', () => {
      expect(() =>
        validateOptions({
          ...emptyRawOptions(),
          host: ['pve1'],
          password: 'test-secret',
          port: '70000',
        }),
      ).toThrow(/^Invalid options: port: /);
    });

    it('should reject a malformed override', () => {
      expect(() =>
        validateOptions({
          ...emptyRawOptions(),
          host: ['pve1'],
          password: 'test-secret',
          override: ['id=qemu/*^critdisk^lots'],
        }),
      ).toThrow("Invalid override 'id=qemu/*^critdisk^lots': value 'lots' is not numeric");
    });
  });

  describe('loadOptions', () => {
    it('should return help without validating anything else', () => {
      expect(loadOptions(['--help'], {})).toEqual({ kind: 'help' });
      expect(loadOptions(['-h', '-m', 'qemu'], {})).toEqual({ kind: 'help' });
    });

    it('should take the password from the environment', () => {
      const loaded = loadOptions(['-H', 'pve1', '-m', 'node'], {
        CHECK_PROXMOX_PASSWORD: 'test-secret',
      });
      expect(loaded.kind === 'run' && loaded.options.password).toBe('test-secret');
    });

    it('should prefer a password given on the command line', () => {
      const loaded = loadOptions(['-H', 'pve1', '-p', 'cli-secret'], {
        CHECK_PROXMOX_PASSWORD: 'test-secret',
      });
      expect(loaded.kind === 'run' && loaded.options.password).toBe('cli-secret');
    });

    it('should merge a config file under the command line', () => {
      const readFile = jest.fn(() => 'host pve1\npassword test-secret\nmode node\n');

      const argv = ['--config', '/etc/probe.cfg', '-H', 'pve2', '-m', 'lxc'];
      const loaded = loadOptions(argv, {}, readFile);

      expect(readFile).toHaveBeenCalledWith('/etc/probe.cfg');
      expect(loaded.kind).toBe('run');
      if (loaded.kind === 'run') {
        expect(loaded.options.host).toEqual(['pve1', 'pve2']);
        expect(loaded.options.mode).toBe('lxc');
        expect(loaded.options.password).toBe('test-secret');
      }
    });

    it('should report an unreadable config file', () => {
      const readFile = jest.fn((): string => {
        throw new Error('ENOENT: no such file');
      });

      expect(() => loadOptions(['--config', 'missing.cfg'], {}, readFile)).toThrow(
        'Cannot read config file missing.cfg: ENOENT: no such file',
      );
    });
  });

  describe('renderHelp', () => {
    it('should list every mode', () => {
      const help = renderHelp();
      expect(help).toContain('  qemu       Check QEMU virtual machines, named <node>.<name>\n');
      expect(help).toContain('  status     Check cluster quorum and node membership\n');
    });
  });
});
