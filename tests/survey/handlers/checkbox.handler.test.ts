import { CheckboxHandler } from '../../../src/survey/handlers/checkbox.handler.js';
import { multiChoiceCount } from '../../../src/survey/handlers/base.handler.js';
import { CheerioSession } from '../../stubs/cheerio-session.js';
import { buildContext } from '../../stubs/context.js';

const TOPPINGS_PAGE = `
<div id="c1">
  <h3>Pick toppings</h3>
  <label><input type="checkbox" id="t1" value="cheese"> Cheese</label>
  <label><input type="checkbox" id="t2" value="ham"> Ham</label>
  <label><input type="checkbox" id="t3" value="olive"> Olive</label>
</div>`;

describe('multiChoiceCount', () => {
  it('stays within [min(2, n), min(5, n)]', () => {
    for (let n = 1; n <= 8; n++) {
      for (const r of [0, 0.3, 0.6, 0.999]) {
        const count = multiChoiceCount(n, () => r);
        expect(count).toBeGreaterThanOrEqual(Math.min(2, n));
        expect(count).toBeLessThanOrEqual(Math.min(5, n));
      }
    }
  });

  it('hits both bounds', () => {
    expect(multiChoiceCount(8, () => 0)).toBe(2);
    expect(multiChoiceCount(8, () => 0.999)).toBe(5);
    expect(multiChoiceCount(0, () => 0.5)).toBe(0);
  });
});

describe('CheckboxHandler', () => {
  it('ticks a subset of the unticked boxes', async () => {
    const session = new CheerioSession(TOPPINGS_PAGE);
    const { context, events } = buildContext(session);
    const answers: string[] = [];
    events.on('run:answer', (event) => answers.push(event.answer));

    const result = await new CheckboxHandler(context).run();

    expect(result).toEqual({ control: 'checkbox', committed: 2, interrupted: false });
    expect(answers).toEqual(['Cheese', 'Ham']);
    expect(session.query('#t3').attr('checked')).toBeUndefined();
  });

  it('only picks from unticked boxes and never unticks', async () => {
    const session = new CheerioSession(TOPPINGS_PAGE);
    const { context } = buildContext(session);
    const handler = new CheckboxHandler(context);

    await handler.run();
    const second = await handler.run();
    const third = await handler.run();

    expect(second.committed).toBe(1);
    expect(third.committed).toBe(0);
    expect(session.callsTo('click').map((c) => c.target)).toEqual(['t1', 't2', 't3']);
    expect(session.query('input[checked]')).toHaveLength(3);
  });

  it('leaves a pre-ticked box alone', async () => {
    const session = new CheerioSession(
      '<div id="c"><input type="checkbox" id="a" checked><input type="checkbox" id="b">' +
        '<input type="checkbox" id="c2"><input type="checkbox" id="d"></div>',
    );
    const { context, events } = buildContext(session);
    const answers: string[] = [];
    events.on('run:answer', (event) => answers.push(event.answer));

    await new CheckboxHandler(context).run();

    expect(session.callsTo('click').map((c) => c.target)).toEqual(['b', 'c2']);
    expect(answers).toEqual(['<box>', '<box>']);
    expect(session.query('#a').attr('checked')).toBe('checked');
  });

  it('answers each named question inside a shared div', async () => {
    const session = new CheerioSession(
      '<div><fieldset><legend>Fruit</legend>' +
        '<label><input type="checkbox" name="fruit" id="f1">Fig</label>' +
        '<label><input type="checkbox" name="fruit" id="f2">Kiwi</label>' +
        '<label><input type="checkbox" name="fruit" id="f3">Lime</label></fieldset>' +
        '<fieldset><legend>Vegetables</legend>' +
        '<label><input type="checkbox" name="veg" id="v1">Kale</label>' +
        '<label><input type="checkbox" name="veg" id="v2">Leek</label>' +
        '<label><input type="checkbox" name="veg" id="v3">Okra</label></fieldset></div>',
    );
    const { context } = buildContext(session);

    const result = await new CheckboxHandler(context).run();

    expect(result.committed).toBe(4);
    expect(session.callsTo('click').map((c) => c.target)).toEqual(['f1', 'f2', 'v1', 'v2']);
  });

  it('reports partial progress when paused between ticks', async () => {
    let running = true;
    const session = new CheerioSession(TOPPINGS_PAGE);
    const { context, events } = buildContext(session, { isRunning: () => running });
    events.on('run:answer', () => {
      running = false;
    });

    const result = await new CheckboxHandler(context).run();

    expect(result).toEqual({ control: 'checkbox', committed: 1, interrupted: true });
    expect(session.callsTo('click').map((c) => c.target)).toEqual(['t1']);
  });
});
