// Submit-time sanity checks for the contact form. Only the shape the page promises is checked: an `@` in the email.
export function isPlausibleEmail(value: string): boolean {
  return value.includes('@');
}

export function findEmailInput(form: HTMLFormElement, selector: string): HTMLInputElement | null {
  const field = form.querySelector(selector);
  return field instanceof HTMLInputElement ? field : null;
}

// Returns the message to surface, or null when the submission may proceed
export function validateContactForm(
  form: HTMLFormElement,
  emailSelector: string,
  invalidEmailMessage: string
): string | null {
  const email = findEmailInput(form, emailSelector);
  if (!email) return null;
  return isPlausibleEmail(email.value) ? null : invalidEmailMessage;
}
