import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { descriptorToJson, parseEgg } from '../../src/core/egg/index.js';
import { FormatError } from '../../src/core/errors.js';

describe('parseEgg', () => {
  it('parses a typical egg', () => {
    const egg = parseEgg({
      name: 'Example Egg',
      description: 'Test egg',
      startup: './start.sh',
      docker_images: { default: 'example/image:latest' },
      variables: [
        { name: 'Server Port', env_variable: 'SERVER_PORT', default_value: '25565', required: true },
        { name: 'Optional Flag', env_variable: 'OPTIONAL_FLAG', default_value: 'false', required: false },
      ],
      config: { ports: ['25565'] },
    });

    expect(egg.name).toBe('Example Egg');
    expect(egg.description).toBe('Test egg');
    expect(egg.startup).toBe('./start.sh');
    expect(egg.dockerImages.get('default')).toBe('example/image:latest');
    expect(egg.variables).toEqual([
      { name: 'Server Port', envVariable: 'SERVER_PORT', defaultValue: '25565', required: true },
      { name: 'Optional Flag', envVariable: 'OPTIONAL_FLAG', defaultValue: 'false', required: false },
    ]);
    expect(egg.ports).toEqual([25565]);
  });

  it('returns an empty descriptor for an empty object', () => {
    const egg = parseEgg({});
    expect(egg.name).toBeUndefined();
    expect(egg.dockerImages.size).toBe(0);
    expect(egg.variables).toEqual([]);
    expect(egg.ports).toEqual([]);
    expect(egg.installScript).toBeUndefined();
  });

  it.each([
    [[], 'array'],
    [null, 'null'],
    ['egg', 'string'],
    [42, 'number'],
  ])('rejects a top-level %j', (input, type) => {
    expect(() => parseEgg(input)).toThrow(FormatError);
    expect(() => parseEgg(input)).toThrow(`Egg JSON must be an object at the top level; got ${type}`);
  });

  describe('names', () => {
    it('falls back to title when name is empty', () => {
      expect(parseEgg({ name: '', title: 'Rust' }).name).toBe('Rust');
    });

    it('reads scalar names as text and ignores objects', () => {
      expect(parseEgg({ name: 7 }).name).toBe('7');
      expect(parseEgg({ name: { en: 'x' } }).name).toBeUndefined();
    });

    it('keeps an empty description', () => {
      expect(parseEgg({ description: '' }).description).toBe('');
    });
  });

  describe('images', () => {
    it('labels list entries by position and skips non-strings', () => {
      const egg = parseEgg({ docker_images: ['a:1', 5, 'b:2'] });
      expect([...egg.dockerImages]).toEqual([
        ['image-1', 'a:1'],
        ['image-3', 'b:2'],
      ]);
    });

    it('falls through an empty mapping to the camelCase key', () => {
      const egg = parseEgg({ docker_images: {}, dockerImages: { java: 'java:21' } });
      expect([...egg.dockerImages]).toEqual([['java', 'java:21']]);
    });

    it('keeps mapping order', () => {
      const egg = parseEgg({ docker_images: { 'Java 21': 'java:21', 'Java 17': 'java:17' } });
      expect([...egg.dockerImages.keys()]).toEqual(['Java 21', 'Java 17']);
    });

    it('adds a single image under "default"', () => {
      const egg = parseEgg({ docker_images: { java: 'java:21' }, image: 'single:latest' });
      expect([...egg.dockerImages]).toEqual([
        ['java', 'java:21'],
        ['default', 'single:latest'],
      ]);
    });

    // Legacy behaviour: a "default" entry in the mapping beats the single image key.
    it('lets an explicit "default" mapping entry win over docker_image', () => {
      const egg = parseEgg({ docker_images: { default: 'mapped:1' }, docker_image: 'single:2' });
      expect([...egg.dockerImages]).toEqual([['default', 'mapped:1']]);
    });
  });

  describe('variables', () => {
    it('falls back to the env variable for the display name', () => {
      const egg = parseEgg({
        variables: [{ env_variable: 'SERVER_JARFILE', default: 'server.jar', is_required: 'yes' }],
      });
      expect(egg.variables).toEqual([
        { name: 'SERVER_JARFILE', envVariable: 'SERVER_JARFILE', defaultValue: 'server.jar', required: true },
      ]);
    });

    it('prefers default_value over default and coerces scalars to text', () => {
      const egg = parseEgg({ variables: [{ name: 'Players', default_value: 20, default: 'x' }] });
      expect(egg.variables[0]?.defaultValue).toBe('20');
    });

    it('skips entries that are not objects', () => {
      const egg = parseEgg({ variables: ['MOTD', null, { name: 'Motd' }] });
      expect(egg.variables).toEqual([{ name: 'Motd', required: false }]);
    });

    it('reads the environment mapping when variables are absent', () => {
      const egg = parseEgg({ environment: { MAX_PLAYERS: 20, MOTD: null } });
      expect(egg.variables).toEqual([
        { name: 'MAX_PLAYERS', envVariable: 'MAX_PLAYERS', defaultValue: '20', required: false },
        { name: 'MOTD', envVariable: 'MOTD', required: false },
      ]);
    });
  });

  describe('ports', () => {
    it('unions config, top-level and port-variable defaults', () => {
      const egg = parseEgg({
        config: { port: 27015 },
        ports: [27016, '27017', 70000, 'x'],
        variables: [{ env_variable: 'QUERY_PORT', default_value: '27020' }],
      });
      expect(egg.ports).toEqual([27015, 27016, 27017, 27020]);
    });

    it('falls through an empty config.ports to config.port', () => {
      expect(parseEgg({ config: { ports: [], port: '25565' } }).ports).toEqual([25565]);
    });

    it('ignores non-numeric port variable defaults', () => {
      const egg = parseEgg({ variables: [{ env_variable: 'SERVER_PORT', default_value: 'auto' }] });
      expect(egg.ports).toEqual([]);
    });
  });

  describe('installation', () => {
    it('normalizes line endings and keeps the entrypoint', () => {
      const egg = parseEgg({
        scripts: { installation: { script: 'apt update\r\napt install -y curl', container: 'debian:12', entrypoint: 'bash' } },
      });
      expect(egg.installScript).toBe('apt update\napt install -y curl');
      expect(egg.installImage).toBe('debian:12');
      expect(egg.installEntrypoint).toBe('bash');
    });

    it('drops a script that has no container', () => {
      const egg = parseEgg({ scripts: { installation: { script: 'echo hi' } } });
      expect(egg.installScript).toBeUndefined();
      expect(egg.installImage).toBeUndefined();
    });
  });
});

describe('descriptorToJson', () => {
  const egg = parseEgg({
    name: 'Valheim',
    docker_images: { 'Debian': 'ghcr.io/example/debian:12' },
    variables: [{ name: 'Server Port', env_variable: 'SERVER_PORT', default_value: '2456', required: true }],
    ports: [2457],
    scripts: { installation: { script: 'echo install', container: 'debian:12' } },
  });

  it('emits the canonical snake_case shape', () => {
    expect(descriptorToJson(egg)).toEqual({
      name: 'Valheim',
      description: null,
      startup: null,
      docker_images: { Debian: 'ghcr.io/example/debian:12' },
      variables: [
        {
          name: 'Server Port',
          env_variable: 'SERVER_PORT',
          description: null,
          default_value: '2456',
          required: true,
        },
      ],
      ports: [2456, 2457],
      install_script: 'echo install',
      install_image: 'debian:12',
      install_entrypoint: null,
    });
  });

  it('round-trips images, variables and ports through parseEgg', () => {
    const reparsed = parseEgg(JSON.parse(JSON.stringify(descriptorToJson(egg))));
    expect([...reparsed.dockerImages]).toEqual([...egg.dockerImages]);
    expect(reparsed.variables).toEqual(egg.variables);
    expect(reparsed.ports).toEqual(egg.ports);
  });

  it('round-trips any parsed egg through its canonical JSON', () => {
    const label = fc.stringMatching(/^[A-Za-z0-9 .-]{1,12}$/);
    const envKey = fc.constantFrom('SERVER_PORT', 'QUERY_PORT', 'PORT', 'MOTD', 'MAX_PLAYERS', '', 'server port');
    const variable = fc.record(
      {
        name: fc.string({ maxLength: 12 }),
        env_variable: envKey,
        description: fc.string({ maxLength: 20 }),
        default_value: fc.oneof(fc.string({ maxLength: 8 }), fc.integer({ min: 0, max: 70000 }).map(String)),
        required: fc.oneof(fc.boolean(), fc.constantFrom('yes', 'no', '1', '0', 'TRUE')),
      },
      { requiredKeys: [] }
    );
    const rawEgg = fc.record(
      {
        name: fc.string({ maxLength: 12 }),
        description: fc.string({ maxLength: 20 }),
        startup: fc.string({ maxLength: 20 }),
        docker_images: fc.dictionary(label, fc.string({ maxLength: 16 }), { maxKeys: 4 }),
        variables: fc.array(variable, { maxLength: 4 }),
        config: fc.record({ ports: fc.array(fc.integer({ min: -5, max: 70000 }), { maxLength: 4 }) }),
      },
      { requiredKeys: [] }
    );

    fc.assert(
      fc.property(rawEgg, (raw) => {
        const descriptor = parseEgg(raw);
        const reparsed = parseEgg(JSON.parse(JSON.stringify(descriptorToJson(descriptor))));
        expect(reparsed.name).toEqual(descriptor.name);
        expect(reparsed.description).toEqual(descriptor.description);
        expect(reparsed.startup).toEqual(descriptor.startup);
        expect([...reparsed.dockerImages]).toEqual([...descriptor.dockerImages]);
        expect(reparsed.variables).toEqual(descriptor.variables);
        expect(reparsed.ports).toEqual(descriptor.ports);
      })
    );
  });
});
