import { describe, it, expect } from 'vitest';

import {
  KNOWN_ELEMENTS,
  requireLocator,
  resolveLocator,
} from '../../src/browser/locator.js';
import { describeSelector } from '../../src/browser/selectors.js';
import { LocatorNotFoundError } from '../../src/core/errors.js';
import type { BlueprintElement } from '../../src/schema/job.js';

const fullyTagged: BlueprintElement = {
  logical_name: 'login',
  tag: 'input',
  text: 'Login',
  id: 'login-button',
  name: 'login-button',
  placeholder: 'Press to log in',
  aria_label: 'Login',
  role: 'button',
  data_test: 'login-button-test',
};

describe('resolveLocator', () => {
  it('prefers data_test over every other attribute', () => {
    const result = resolveLocator('login', [fullyTagged]);

    expect(result).toEqual({
      found: true,
      selector: { strategy: 'testid', value: 'login-button-test' },
      source: 'blueprint',
    });
  });

  it('falls back to id when data_test is missing or blank', () => {
    const blueprint = [{ ...fullyTagged, data_test: '   ' }];

    expect(resolveLocator('login', blueprint)).toMatchObject({
      found: true,
      selector: { strategy: 'id', value: 'login-button' },
    });
  });

  it('uses exact text before placeholder', () => {
    const blueprint = [{ ...fullyTagged, data_test: null, id: null }];

    expect(resolveLocator('login', blueprint)).toMatchObject({
      selector: { strategy: 'text', value: 'Login' },
    });
  });

  it('uses placeholder when nothing more stable exists', () => {
    const blueprint: BlueprintElement[] = [
      { logical_name: 'user', tag: 'input', text: '', placeholder: 'Username' },
    ];

    expect(resolveLocator('user', blueprint)).toMatchObject({
      selector: { strategy: 'placeholder', value: 'Username' },
    });
  });

  it('uses the known-elements table for names missing from the blueprint', () => {
    expect(resolveLocator('inventory_list', [fullyTagged])).toEqual({
      found: true,
      selector: { strategy: 'css', value: KNOWN_ELEMENTS['inventory_list'] },
      source: 'known',
    });
  });

  it('accepts an extended known-elements table', () => {
    const result = resolveLocator('home', [], { home: '.home-banner' });

    expect(result).toMatchObject({
      found: true,
      selector: { strategy: 'css', value: '.home-banner' },
    });
  });

  it('does not consult known elements for a blueprint entry without usable attributes', () => {
    const blueprint: BlueprintElement[] = [
      { logical_name: 'app_logo', tag: 'div', role: 'img', data_test: ' ' },
    ];

    expect(resolveLocator('app_logo', blueprint)).toEqual({
      found: false,
      targetName: 'app_logo',
    });
  });

  it('reports not found instead of a partial match', () => {
    const blueprint: BlueprintElement[] = [
      { logical_name: 'login_button', id: 'login' },
      { logical_name: 'bare', tag: 'div', name: 'only-name', aria_label: 'x' },
    ];

    expect(resolveLocator('login', blueprint)).toEqual({
      found: false,
      targetName: 'login',
    });
    expect(resolveLocator('bare', blueprint)).toEqual({
      found: false,
      targetName: 'bare',
    });
  });
});

describe('requireLocator', () => {
  it('throws LocatorNotFoundError naming the target', () => {
    expect(() => requireLocator('ghost', [])).toThrow(LocatorNotFoundError);
    expect(() => requireLocator('ghost', [])).toThrow(
      "Could not determine a locator for 'ghost'",
    );
  });
});

describe('describeSelector', () => {
  it('renders each strategy', () => {
    expect(describeSelector({ strategy: 'testid', value: 'a' })).toBe('[data-test="a"]');
    expect(describeSelector({ strategy: 'id', value: 'b' })).toBe('#b');
    expect(describeSelector({ strategy: 'text', value: 'Go' })).toBe('text="Go"');
    expect(describeSelector({ strategy: 'placeholder', value: 'Name' })).toBe(
      'placeholder="Name"',
    );
    expect(describeSelector({ strategy: 'css', value: '.x' })).toBe('.x');
  });
});
