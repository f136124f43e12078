import * as fs from 'fs/promises';
import * as path from 'path';
import { createServerConfig, DEFAULT_GRACE_PERIOD, DEFAULT_READ_TIMEOUT, parsePortArgument } from '../src/config';
import { ConfigError } from '../src/types';
import { makeTempDir, removeDir } from './helpers';

describe('createServerConfig', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await makeTempDir();
        await fs.mkdir(path.join(dir, 'site'));
        await fs.writeFile(path.join(dir, 'file.txt'), 'x');
        await fs.symlink(path.join(dir, 'site'), path.join(dir, 'link'));
    });

    afterAll(async () => {
        await removeDir(dir);
    });

    it('fills in defaults and canonicalizes the base directory', async () => {
        const config = await createServerConfig({ port: 8080, baseDirectory: path.join(dir, 'link', '..', 'link') });

        expect(config).toEqual({
            port: 8080,
            baseDirectory: path.join(dir, 'site'),
            readTimeout: DEFAULT_READ_TIMEOUT,
            gracePeriod: DEFAULT_GRACE_PERIOD,
        });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('keeps explicit timeouts', async () => {
        const config = await createServerConfig({ port: 0, baseDirectory: dir, readTimeout: 250, gracePeriod: 500 });

        expect(config.readTimeout).toBe(250);
        expect(config.gracePeriod).toBe(500);
    });

    it('rejects out of range ports and timeouts', async () => {
        await expect(createServerConfig({ port: 70000, baseDirectory: dir })).rejects.toThrow('Invalid port: 70000');
        await expect(createServerConfig({ port: 1.5, baseDirectory: dir })).rejects.toBeInstanceOf(ConfigError);
        await expect(createServerConfig({ port: 80, baseDirectory: dir, readTimeout: 0 })).rejects.toThrow(
            'Invalid read timeout: 0'
        );
        await expect(createServerConfig({ port: 80, baseDirectory: dir, gracePeriod: -1 })).rejects.toThrow(
            'Invalid grace period: -1'
        );
    });

    it('rejects a missing or non-directory base', async () => {
        const missing = path.join(dir, 'missing');
        const file = path.join(dir, 'file.txt');

        await expect(createServerConfig({ port: 80, baseDirectory: missing })).rejects.toThrow(
            `Base directory not found: ${missing}`
        );
        await expect(createServerConfig({ port: 80, baseDirectory: file })).rejects.toThrow(
            `Base directory is not a directory: ${file}`
        );
    });
});

describe('parsePortArgument', () => {
    it('accepts decimal digits only', () => {
        expect(parsePortArgument('8080')).toBe(8080);
        expect(() => parsePortArgument('80a')).toThrow(ConfigError);
        expect(() => parsePortArgument('-1')).toThrow('Invalid port: -1');
    });
});
