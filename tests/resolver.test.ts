import { describe, it, expect } from 'vitest';

import {
  ElementResolver,
  describeLocator,
  instantiateChain,
  toSelector,
} from '../src/browser/index.js';
import { FakePage } from './support/fakePortal.js';
import type { FakeNode } from './support/fakePortal.js';

function pageWith(dom: Record<string, FakeNode[]>): FakePage {
  return new FakePage((selector) => dom[selector] ?? []);
}

describe('toSelector', () => {
  it.each([
    [{ strategy: 'css', value: 'input.email' }, 'input.email'],
    [{ strategy: 'xpath', value: "//input[@type='email']" }, "xpath=//input[@type='email']"],
    [{ strategy: 'text', value: 'Sign In' }, 'text=Sign In'],
    [{ strategy: 'id', value: 'email' }, '[id="email"]'],
    [{ strategy: 'name', value: 'password' }, '[name="password"]'],
    [{ strategy: 'placeholder', value: 'mail' }, '[placeholder*="mail" i]'],
    [{ strategy: 'testid', value: 'login-form' }, '[data-testid="login-form"]'],
  ] as const)('maps %o to %s', (hint, expected) => {
    expect(toSelector(hint)).toBe(expected);
  });

  it('escapes quotes in attribute values', () => {
    expect(toSelector({ strategy: 'id', value: 'a"b' })).toBe('[id="a\\"b"]');
  });
});

describe('instantiateChain', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    const chain = instantiateChain(
      [
        { strategy: 'css', value: 'li.page-{page}' },
        { strategy: 'xpath', value: "//a[text()='{page}' and @data-x='{other}']" },
      ],
      { page: '4' },
    );
    expect(chain.map(describeLocator)).toEqual([
      'css:li.page-4',
      "xpath://a[text()='4' and @data-x='{other}']",
    ]);
  });
});

describe('ElementResolver', () => {
  it('returns the first strategy that matches', async () => {
    const resolver = new ElementResolver(pageWith({ 'input.hit': [{ text: 'ok' }] }));

    const outcome = await resolver.resolve('email input', [
      { strategy: 'css', value: 'input.miss' },
      { strategy: 'css', value: 'input.hit' },
    ]);

    expect(outcome.found).toBe(true);
    if (!outcome.found) return;
    expect(outcome.index).toBe(1);
    expect(outcome.hint).toEqual({ strategy: 'css', value: 'input.hit' });
    expect(await outcome.element.innerText({ timeout: 100 })).toBe('ok');
  });

  it('reports every strategy tried when nothing matches', async () => {
    const resolver = new ElementResolver(pageWith({}));

    const outcome = await resolver.resolve('submit button', [
      { strategy: 'css', value: 'button.a' },
      { strategy: 'id', value: 'go' },
    ]);

    expect(outcome).toEqual({
      found: false,
      target: 'submit button',
      tried: ['css:button.a', 'id:go'],
    });
  });

  it('skips hidden matches when visibility is required', async () => {
    const resolver = new ElementResolver(
      pageWith({ '.hidden': [{ visible: false }], '.shown': [{ text: 'here' }] }),
    );
    const chain = [
      { strategy: 'css', value: '.hidden' },
      { strategy: 'css', value: '.shown' },
    ] as const;

    const attached = await resolver.resolve('x', [...chain]);
    const visible = await resolver.resolve('x', [...chain], { state: 'visible' });

    expect(attached.found && attached.index).toBe(0);
    expect(visible.found && visible.index).toBe(1);
  });

  it('resolveAll uses the first non-empty strategy', async () => {
    const rows: FakeNode[] = [{ text: 'r1' }, { text: 'r2' }, { text: 'r3' }];
    const resolver = new ElementResolver(pageWith({ 'tbody tr': [], tr: rows }));

    const outcome = await resolver.resolveAll('rows', [
      { strategy: 'css', value: 'tbody tr' },
      { strategy: 'css', value: 'tr' },
    ]);

    expect(outcome.found).toBe(true);
    if (!outcome.found) return;
    expect(outcome.index).toBe(1);
    expect(outcome.elements).toHaveLength(3);
    expect(await outcome.elements[2]?.innerText({ timeout: 100 })).toBe('r3');
  });

  it('searches inside a parent element', async () => {
    const table: FakeNode = {
      children: (selector) => (selector === 'td' ? [{ text: 'inner' }] : []),
    };
    const page = pageWith({ table: [table], td: [{ text: 'outer' }] });
    const resolver = new ElementResolver(page);

    const cells = await resolver.resolveAll('cells', [{ strategy: 'css', value: 'td' }], {
      within: page.locator('table').first(),
    });

    expect(cells.found).toBe(true);
    if (!cells.found) return;
    expect(await cells.elements[0]?.innerText({ timeout: 100 })).toBe('inner');
  });

  it('resolveAndClick falls through when a click fails', async () => {
    const clicked: string[] = [];
    const resolver = new ElementResolver(
      pageWith({
        'a.blocked': [{ failClick: true, onClick: () => clicked.push('blocked') }],
        'a.open': [{ onClick: () => clicked.push('open') }],
      }),
    );

    const outcome = await resolver.resolveAndClick('report navigation', [
      { strategy: 'css', value: 'a.blocked' },
      { strategy: 'css', value: 'a.open' },
    ]);

    expect(outcome.found && outcome.index).toBe(1);
    expect(clicked).toEqual(['open']);
  });

  it('resolveAndClick settles after hovering before it clicks', async () => {
    const button: FakeNode = {};
    const page = pageWith({ 'button.submit': [button] });
    button.events = page.events;
    button.onClick = () => page.events.push('click');
    const resolver = new ElementResolver(page, { afterHover: [200, 500], random: () => 0 });

    const outcome = await resolver.resolveAndClick('submit button', [
      { strategy: 'css', value: 'button.submit' },
    ]);

    expect(outcome.found).toBe(true);
    expect(page.events).toEqual(['hover', 'wait:200', 'click']);
  });

  it('resolveAndClick still clicks when the hover fails', async () => {
    const clicked: string[] = [];
    const resolver = new ElementResolver(
      pageWith({ 'a.report': [{ failHover: true, onClick: () => clicked.push('report') }] }),
    );

    const outcome = await resolver.resolveAndClick('report navigation', [
      { strategy: 'css', value: 'a.report' },
    ]);

    expect(outcome.found && outcome.index).toBe(0);
    expect(clicked).toEqual(['report']);
  });
});
