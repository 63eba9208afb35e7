import { escapeHtml } from './html';

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML mode reserves', () => {
    expect(escapeHtml('a<b>&"c"')).toBe('a&lt;b&gt;&amp;&quot;c&quot;');
  });

  it('leaves ordinary text untouched', () => {
    expect(escapeHtml('https://t.me/example_books')).toBe('https://t.me/example_books');
  });
});
