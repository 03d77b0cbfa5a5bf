import type { Transcript, Turn, UserProfile } from '../types/types';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderTurn(turn: Turn): string {
  const content = escapeHtml(turn.content);
  if (turn.role === 'user') {
    return `<div class="turn user"><b>You:</b> ${content}</div>`;
  }
  return `<div class="turn agent"><b>Agent:</b> ${content}</div>`;
}

export function renderProfile(profile: UserProfile): string {
  const history = profile.travelHistory.map((country) => `<li>${escapeHtml(country)}</li>`).join('');
  return [
    '<aside class="profile">',
    '<h2>User Profile</h2>',
    `<p><b>Name:</b> ${escapeHtml(profile.name)}</p>`,
    `<p><b>Age:</b> ${profile.age}</p>`,
    `<p><b>Departure City:</b> ${escapeHtml(profile.departureCity)}</p>`,
    `<p><b>Budget:</b> $${profile.budget}</p>`,
    '<p><b>Travel History:</b></p>',
    `<ul>${history}</ul>`,
    '</aside>',
  ].join('\n');
}

const STYLES = `
body { font-family: sans-serif; margin: 0; display: flex; }
.profile { width: 240px; padding: 16px; background: #f0f2f6; min-height: 100vh; }
main { flex: 1; max-width: 760px; margin: 0 auto; padding: 16px; }
.turn { padding: 10px; border-radius: 10px; margin: 5px 0; }
.turn.user { text-align: right; background-color: #d1e7dd; }
.turn.agent { text-align: left; background-color: #f8f9fa; }
.busy { color: #6c757d; font-style: italic; }
form { display: flex; gap: 8px; margin-top: 16px; }
form input { flex: 1; padding: 8px; }
`;

export interface ChatPageState {
  profile: UserProfile;
  turns: Transcript;
  busy: boolean;
}

export function renderChatPage({ profile, turns, busy }: ChatPageState): string {
  const form = busy
    ? '<p class="busy">Agent is thinking...</p>'
    : [
        '<form method="post" action="/messages">',
        '<label for="message">Type your message:</label>',
        '<input id="message" name="message" type="text" autocomplete="off" autofocus>',
        '<button type="submit">Send</button>',
        '</form>',
      ].join('\n');

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Travel Booking Assistant</title>${busy ? '\n<meta http-equiv="refresh" content="1">' : ''}
<style>${STYLES}</style>
</head>
<body>
${renderProfile(profile)}
<main>
<h1>Travel Booking Assistant</h1>
<p>Chat with your <b>AI Travel Agent</b>, with continuous conversation &amp; safety guardrails.</p>
<section class="transcript">
${turns.map(renderTurn).join('\n')}
</section>
${form}
</main>
</body>
</html>
`;
}
