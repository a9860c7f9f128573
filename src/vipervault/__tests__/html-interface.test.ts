import { describe, it, expect } from 'vitest';
import { contentSecurityPolicy, createNonce, renderPage, scriptJSON } from '../html-interface';
import { normalizeViews } from '../config';

describe('contentSecurityPolicy', () => {
  it('allows only the nonced inline script', () => {
    expect(contentSecurityPolicy('abc')).toBe(
      "default-src 'self'; script-src 'self' 'nonce-abc'; style-src 'self' 'unsafe-inline'; connect-src 'self';"
    );
  });
});

describe('createNonce', () => {
  it('returns a fresh url-safe value', () => {
    const nonce = createNonce();

    expect(nonce).toMatch(/^[A-Za-z0-9_-]{22}$/);
    expect(createNonce()).not.toBe(nonce);
  });
});

describe('scriptJSON', () => {
  it('cannot close the script element', () => {
    expect(scriptJSON({ cmd: '</script><script>' })).toBe('{"cmd":"\\u003c/script>\\u003cscript>"}');
  });

  it('escapes line and paragraph separators', () => {
    expect(scriptJSON('a\u2028b\u2029c')).toBe('"a\\u2028b\\u2029c"');
  });
});

describe('renderPage', () => {
  const views = normalizeViews({
    'Syslog': 'tail /var/log/syslog',
    '"><img src=x>': { cmd: 'echo <b>', refresh: 0 }
  }, 30);

  const html = renderPage({ title: 'Ops <Vault>', views, defaultRefresh: 15, nonce: 'test-nonce' });

  it('escapes the title', () => {
    expect(html).toContain('<title>Ops &lt;Vault&gt;</title>');
  });

  it('renders one escaped option per view', () => {
    expect(html).toContain('<option value="Syslog">Syslog</option>');
    expect(html).toContain('<option value="&quot;&gt;&lt;img src=x&gt;">"&gt;&lt;img src=x&gt;</option>');
  });

  it('puts the nonce on the inline script', () => {
    expect(html).toContain('<script nonce="test-nonce">');
  });

  it('embeds the default refresh and the views as data', () => {
    expect(html).toContain('const DEFAULT_INTERVAL = 15;');
    expect(html).toContain('"Syslog":{"cmd":"tail /var/log/syslog","refresh":30,"safe_output":true,"bottom":true}');
    expect(html).toContain('"cmd":"echo \\u003cb>"');
  });
});
