import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RenderError, RenderTimeoutError, ValidationError } from '../errors/index.js';
import { buildSnapshot } from '../snapshot/builder.js';
import { makeBranding, makeDocument, makeLogger } from '../test-fixtures.js';
import type { AssetLoader } from './assets.js';
import { FileAssetLoader, detectImageFormat } from './assets.js';
import { Renderer, brandingFingerprint, escapeHtml } from './renderer.js';

const snapshot = buildSnapshot(makeDocument(), makeBranding(), {
  id: 'snap-1',
  version: 1,
  createdAt: '2024-05-01T10:00:00.000Z',
});

function loaderReturning(bytes: Buffer | null, delayMs = 0): AssetLoader {
  return {
    load: () => new Promise((resolve) => setTimeout(() => resolve(bytes), delayMs)),
  };
}

describe('Renderer.render', () => {
  it('produces a PDF', async () => {
    const pdf = await new Renderer().render(snapshot, 'classic', snapshot.branding);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('is byte-identical for identical inputs', async () => {
    const renderer = new Renderer();
    const first = await renderer.render(snapshot, 'modern', snapshot.branding);
    const second = await renderer.render(snapshot, 'modern', snapshot.branding);
    expect(first.equals(second)).toBe(true);
  });

  it('takes the PDF dates from the snapshot', async () => {
    const pdf = await new Renderer().render(snapshot, 'classic', snapshot.branding);
    expect(pdf.toString('latin1')).toContain('D:20240501100000Z');
  });

  it('changes output when the branding colour changes', async () => {
    const renderer = new Renderer();
    const purple = await renderer.render(snapshot, 'classic', snapshot.branding);
    const teal = await renderer.render(snapshot, 'classic', {
      ...snapshot.branding,
      primaryColor: '#319795',
    });
    expect(purple.equals(teal)).toBe(false);
  });

  it.each(['classic', 'modern', 'minimal'])('renders the %s template', async (templateId) => {
    const pdf = await new Renderer().render(snapshot, templateId, snapshot.branding);
    expect(pdf.length).toBeGreaterThan(500);
  });

  it('rejects templates outside the allow-list', async () => {
    await expect(
      new Renderer().render(snapshot, '../../etc/passwd', snapshot.branding),
    ).rejects.toThrow(ValidationError);
  });

  it('rejects colours that are not hex triples', async () => {
    await expect(
      new Renderer().render(snapshot, 'classic', { ...snapshot.branding, accentColor: 'orange' }),
    ).rejects.toThrow(ValidationError);
  });

  it('falls back to a placeholder when the logo is missing', async () => {
    const logger = makeLogger();
    const renderer = new Renderer({ assets: loaderReturning(null), logger });

    const pdf = await renderer.render(snapshot, 'classic', {
      ...snapshot.branding,
      logoPath: '/srv/assets/missing.png',
    });

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(logger.warn).toHaveBeenCalledWith('Logo not found, using placeholder', {
      logoPath: '/srv/assets/missing.png',
    });
  });

  it('falls back when the logo is not an image', async () => {
    const logger = makeLogger();
    const renderer = new Renderer({ assets: loaderReturning(Buffer.from('GIF89a')), logger });

    await renderer.render(snapshot, 'classic', { ...snapshot.branding, logoPath: '/srv/logo.gif' });

    expect(logger.warn).toHaveBeenCalledWith('Logo is not PNG or JPEG, using placeholder', {
      logoPath: '/srv/logo.gif',
    });
  });

  it('falls back to Helvetica when the font is missing', async () => {
    const logger = makeLogger();
    const renderer = new Renderer({ assets: loaderReturning(null), logger });
    const withFont = { ...snapshot.branding, fontFamily: 'Inter', fontPath: '/srv/fonts/Inter.ttf' };

    const pdf = await renderer.render(snapshot, 'minimal', withFont);
    const plain = await renderer.render(snapshot, 'minimal', { ...snapshot.branding, fontFamily: 'Helvetica' });

    expect(pdf.equals(plain)).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Font not usable, falling back to Helvetica', {
      fontPath: '/srv/fonts/Inter.ttf',
    });
  });

  it('surfaces unrecoverable asset errors as RenderError', async () => {
    const failing: AssetLoader = {
      load: () => Promise.reject(new RenderError('Failed to read asset /srv/logo.png')),
    };
    await expect(
      new Renderer({ assets: failing }).render(snapshot, 'classic', {
        ...snapshot.branding,
        logoPath: '/srv/logo.png',
      }),
    ).rejects.toThrow(RenderError);
  });

  it('times out slow renders', async () => {
    const renderer = new Renderer({
      assets: loaderReturning(null, 200),
      renderTimeoutMs: 20,
    });

    await expect(
      renderer.render(snapshot, 'classic', { ...snapshot.branding, logoPath: '/srv/slow.png' }),
    ).rejects.toThrow(RenderTimeoutError);
  });
});

describe('Renderer.preview', () => {
  it('injects normalised colour components', () => {
    const html = new Renderer().preview(snapshot, 'classic', snapshot.branding);
    expect(html).toContain('--primary-r: 107; --primary-g: 70; --primary-b: 193;');
    expect(html).toContain('--accent-r: 246; --accent-g: 173; --accent-b: 85;');
  });

  it('shows totals with the currency', () => {
    const html = new Renderer().preview(snapshot, 'modern', snapshot.branding);
    expect(html).toContain('<dt>Total</dt><dd>143.00 USD</dd>');
    expect(html).toContain('<body class="template-modern">');
  });

  it('escapes interpolated values', () => {
    const hostile = buildSnapshot(
      makeDocument({ client: { name: '<script>alert(1)</script>' } }),
      makeBranding(),
      { id: 'snap-x', version: 1, createdAt: '2024-05-01T10:00:00.000Z' },
    );
    const html = new Renderer().preview(hostile, 'classic', hostile.branding);

    expect(html).toContain('<div>&lt;script&gt;alert(1)&lt;/script&gt;</div>');
    expect(html).not.toContain('<script>');
  });
});

describe('FileAssetLoader', () => {
  const loader = new FileAssetLoader();

  it('returns null for missing files', async () => {
    expect(await loader.load(join(tmpdir(), 'billvault-no-such-logo.png'))).toBeNull();
  });

  it('returns null for relative paths', async () => {
    expect(await loader.load('logo.png')).toBeNull();
  });

  it('raises RenderError for unreadable paths', async () => {
    await expect(loader.load(tmpdir())).rejects.toThrow(RenderError);
  });
});

describe('detectImageFormat', () => {
  it('sniffs PNG and JPEG signatures', () => {
    expect(detectImageFormat(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0]))).toBe('png');
    expect(detectImageFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
    expect(detectImageFormat(Buffer.from('<svg/>'))).toBeNull();
  });
});

describe('brandingFingerprint', () => {
  it('changes with any branding field', () => {
    const base = brandingFingerprint(snapshot.branding);
    expect(brandingFingerprint({ ...snapshot.branding })).toBe(base);
    expect(brandingFingerprint({ ...snapshot.branding, accentColor: '#000000' })).not.toBe(base);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});
