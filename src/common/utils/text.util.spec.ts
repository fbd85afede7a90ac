import { escapeHtml, uniqueAddresses } from './text.util';

describe('text utils', () => {
  it('escapes HTML special characters', () => {
    expect(escapeHtml(`<b>"Q3" & 'budget'</b>`)).toBe(
      '&lt;b&gt;&quot;Q3&quot; &amp; &#39;budget&#39;&lt;/b&gt;',
    );
  });

  it('de-duplicates addresses ignoring case and keeps the first spelling', () => {
    expect(uniqueAddresses(['Ana@Team.test', 'bo@team.test', 'ana@team.test'])).toEqual([
      'Ana@Team.test',
      'bo@team.test',
    ]);
  });
});
