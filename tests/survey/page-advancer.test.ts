import { PageAdvancer } from '../../src/survey/page-advancer.js';
import { RobustClicker } from '../../src/browser/robust-clicker.js';
import { TypedEventEmitter, type RunAdvancedEvent } from '../../src/shared/events.js';
import { CheerioSession } from '../stubs/cheerio-session.js';
import { captureLogger, messages, noSleep } from '../stubs/context.js';

function advancerFor(session: CheerioSession) {
  const { logger, channel } = captureLogger();
  const events = new TypedEventEmitter();
  const advanced: RunAdvancedEvent[] = [];
  events.on('run:advanced', (event) => advanced.push(event));
  const advancer = new PageAdvancer(session, {
    clicker: new RobustClicker(session, { logger, sleep: noSleep }),
    events,
    logger,
  });
  return { advancer, advanced, channel };
}

describe('PageAdvancer', () => {
  it('clicks a button whose text contains a progression word', async () => {
    const session = new CheerioSession('<button id="back">Back</button><button id="fwd"> Next  page </button>');
    const { advancer, advanced, channel } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(session.callsTo('click').map((c) => c.target)).toEqual(['fwd']);
    expect(advanced).toEqual([{ stage: 'button', label: 'next page' }]);
    expect(messages(channel)).toContain('Clicked Next/Submit (stage=button, word=next)');
  });

  it('tries words in vocabulary order', async () => {
    const session = new CheerioSession('<button id="s">Submit</button><button id="n">Next</button>');
    const { advancer } = advancerFor(session);

    await advancer.advance();

    expect(session.callsTo('click').map((c) => c.target)).toEqual(['n']);
  });

  it('accepts ARIA buttons', async () => {
    const session = new CheerioSession('<div role="button" id="aria">Continue</div>');
    const { advancer } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(session.callsTo('click').map((c) => c.target)).toEqual(['aria']);
  });

  it('falls back to submit inputs', async () => {
    const session = new CheerioSession('<input type="submit" id="sub" value="Send answers">');
    const { advancer, advanced, channel } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(advanced).toEqual([{ stage: 'submit-input', label: 'send answers' }]);
    expect(messages(channel)).toContain('Clicked Submit (stage=submit-input, word=send)');
  });

  it('matches form buttons by substring only in the last stage', async () => {
    const session = new CheerioSession('<form><button id="fb">Nextpage»</button></form>');
    const { advancer, advanced } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(advanced).toEqual([{ stage: 'form-button', label: 'nextpage»' }]);
  });

  it('requires whole words outside forms', async () => {
    const session = new CheerioSession('<button id="g">Going</button>');
    const { advancer } = advancerFor(session);

    expect(await advancer.advance()).toBe(false);
    expect(session.callsTo('click')).toHaveLength(0);
  });

  it('returns false when nothing advances the page', async () => {
    const session = new CheerioSession('<a href="#">Next</a><p>Thank you</p>');
    const { advancer, advanced } = advancerFor(session);

    expect(await advancer.advance()).toBe(false);
    expect(advanced).toEqual([]);
  });

  it('moves on when a matching control refuses the click', async () => {
    const session = new CheerioSession('<button id="a">Next</button><button id="b">Continue</button>')
      .failOn('click', '#a')
      .failOn('pointerClick', '#a')
      .failOn('dispatchSyntheticEvents', '#a');
    const { advancer, advanced } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(advanced).toEqual([{ stage: 'button', label: 'continue' }]);
  });

  it('skips a stage whose search fails', async () => {
    const session = new CheerioSession('<button>Next</button><input type="submit" value="OK">').failOn(
      'findAll',
      "button, [role='button']",
    );
    const { advancer, advanced, channel } = advancerFor(session);

    expect(await advancer.advance()).toBe(true);
    expect(advanced).toEqual([{ stage: 'submit-input', label: 'ok' }]);
    expect(messages(channel)).toContain('Next button search error (stage=button, error=findAll failed (injected))');
  });
});
