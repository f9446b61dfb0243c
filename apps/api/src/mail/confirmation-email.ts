const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export interface ConfirmationEmailContent {
  subject: string;
  html: string;
  text: string;
}

/** Body of the "confirm your email" message. */
export function renderConfirmationEmail(
  username: string,
  confirmUrl: string,
): ConfirmationEmailContent {
  const name = escapeHtml(username);
  const href = escapeHtml(confirmUrl);

  return {
    subject: 'Confirm your email',
    html: [
      '<!DOCTYPE html>',
      '<html>',
      '<body>',
      `<p>Hi ${name},</p>`,
      '<p>Thanks for signing up for Contacts. Please confirm your email address:</p>',
      `<p><a href="${href}">Confirm email</a></p>`,
      '<p>If you did not create an account, you can ignore this message.</p>',
      '</body>',
      '</html>',
    ].join('\n'),
    text: `Hi ${username},\n\nConfirm your email address: ${confirmUrl}\n`,
  };
}
