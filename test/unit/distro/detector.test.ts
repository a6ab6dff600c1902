import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { detectFamily, familyFromOsRelease, parseOsRelease } from '../../../src/distro/detector.js';
import { NotifierError, NotifierErrorCode } from '../../../src/shared/errors.js';
import { catchError } from '../../helpers/catch-error.js';

describe('parseOsRelease', () => {
  it('parses keys and strips quotes', () => {
    const parsed = parseOsRelease('NAME="Rocky Linux"\nID="rocky"\nID_LIKE="rhel centos fedora"\nVERSION_ID=\'9.3\'\n# comment\n');
    expect(parsed).toEqual({ NAME: 'Rocky Linux', ID: 'rocky', ID_LIKE: 'rhel centos fedora', VERSION_ID: '9.3' });
  });
});

describe('familyFromOsRelease', () => {
  it('takes the last ID_LIKE entry', () => {
    expect(familyFromOsRelease({ ID: 'rocky', ID_LIKE: 'rhel centos fedora' })).toBe('fedora');
    expect(familyFromOsRelease({ ID: 'linuxmint', ID_LIKE: 'ubuntu debian' })).toBe('debian');
  });

  it('falls back to ID when ID_LIKE is absent or blank', () => {
    expect(familyFromOsRelease({ ID: 'Gentoo' })).toBe('gentoo');
    expect(familyFromOsRelease({ ID: 'arch', ID_LIKE: '  ' })).toBe('arch');
  });

  it('returns an empty string when neither is present', () => {
    expect(familyFromOsRelease({ NAME: 'Mystery' })).toBe('');
  });
});

describe('detectFamily', () => {
  let prefix: string;

  beforeEach(async () => {
    prefix = await mkdtemp(path.join(tmpdir(), 'notifier-prefix-'));
    await mkdir(path.join(prefix, 'etc'));
  });

  afterEach(async () => {
    await rm(prefix, { recursive: true, force: true });
  });

  it('reads os-release under the prefix', async () => {
    await writeFile(path.join(prefix, 'etc', 'os-release'), 'NAME="Manjaro Linux"\nID=manjaro\nID_LIKE=arch\n');
    expect(detectFamily(prefix)).toBe('arch');
  });

  it('fails with DISTRO_UNKNOWN when os-release is missing', () => {
    const err = catchError(() => detectFamily(prefix));
    expect(err).toBeInstanceOf(NotifierError);
    expect(err).toMatchObject({ code: NotifierErrorCode.DISTRO_UNKNOWN });
  });

  it('fails with DISTRO_UNKNOWN when os-release names no family', async () => {
    await writeFile(path.join(prefix, 'etc', 'os-release'), 'NAME="Nothing"\n');
    expect(() => detectFamily(prefix)).toThrow('unknown Linux distribution/family.');
  });
});
