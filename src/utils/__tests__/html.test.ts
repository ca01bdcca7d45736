import { describe, expect, it } from 'vitest';
import { escapeXml, findImages, parseFragment, toHtml, toXhtml } from '../html.ts';

describe('escapeXml', () => {
  it('escapes markup and quote characters', () => {
    expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
  });
});

describe('toXhtml', () => {
  it('closes void elements and drops comments', () => {
    const document = parseFragment('<p>a<br>b &amp; c</p><img src="x.png" alt=""><!-- note -->');

    expect(toXhtml(document.children)).toBe('<p>a<br/>b &amp; c</p><img src="x.png" alt=""/>');
  });

  it('keeps non-ASCII text as characters and escapes entities it decoded', () => {
    const document = parseFragment('<p>Привет&nbsp;мир &lt;3</p>');

    expect(toXhtml(document.children)).toBe('<p>Привет\u00a0мир &lt;3</p>');
  });

  it('drops attributes that are not valid XML names', () => {
    const document = parseFragment('<span class="x" @click="y">t</span>');

    expect(toXhtml(document.children)).toBe('<span class="x">t</span>');
  });
});

describe('toHtml', () => {
  it('serializes edited image sources', () => {
    const document = parseFragment('<p><img src="a.png"></p>');
    for (const img of findImages(document)) {
      img.attribs.src = 'imgs/b.png';
    }

    expect(toHtml(document)).toBe('<p><img src="imgs/b.png"></p>');
  });
});
