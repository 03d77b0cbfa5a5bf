import { describe, expect, it } from 'vitest';
import { createUserProfile } from '../config/profile';
import { createTurn } from '../session/transcript';
import { escapeHtml, renderChatPage, renderProfile, renderTurn } from './render';

const profile = createUserProfile({
  name: 'Test Traveller',
  age: 45,
  departureCity: 'Tokyo',
  budget: 180.4,
  travelHistory: ['China', 'India'],
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
  });
});

describe('renderTurn', () => {
  it('labels user turns and escapes their content', () => {
    expect(renderTurn(createTurn('user', '<script>x</script>'))).toBe(
      '<div class="turn user"><b>You:</b> &lt;script&gt;x&lt;/script&gt;</div>',
    );
  });

  it('labels agent turns', () => {
    expect(renderTurn(createTurn('agent', 'Hello'))).toBe('<div class="turn agent"><b>Agent:</b> Hello</div>');
  });
});

describe('renderProfile', () => {
  it('shows every profile field', () => {
    const html = renderProfile(profile);

    expect(html).toContain('<p><b>Name:</b> Test Traveller</p>');
    expect(html).toContain('<p><b>Age:</b> 45</p>');
    expect(html).toContain('<p><b>Departure City:</b> Tokyo</p>');
    expect(html).toContain('<p><b>Budget:</b> $180.4</p>');
    expect(html).toContain('<ul><li>China</li><li>India</li></ul>');
  });
});

describe('renderChatPage', () => {
  it('renders the transcript in order with the input form', () => {
    const html = renderChatPage({
      profile,
      turns: [createTurn('user', 'first'), createTurn('agent', 'second')],
      busy: false,
    });

    expect(html.indexOf('<b>You:</b> first')).toBeLessThan(html.indexOf('<b>Agent:</b> second'));
    expect(html).toContain('<form method="post" action="/messages">');
    expect(html).not.toContain('Agent is thinking...');
    expect(html).not.toContain('http-equiv="refresh"');
  });

  it('replaces the form with a busy notice while a turn is running', () => {
    const html = renderChatPage({ profile, turns: [], busy: true });

    expect(html).toContain('<p class="busy">Agent is thinking...</p>');
    expect(html).toContain('<title>Travel Booking Assistant</title>\n<meta http-equiv="refresh" content="1">');
    expect(html).not.toContain('<form');
  });
});
