import { validateContactForm } from '../utils/validateFields';
import { onElement, type ControllerContext } from './context';

const SCOPE = 'ContactForm';

// Blocks submission only for an email without `@`; every other field goes to the server as typed.
export function bindContactForm(ctx: ControllerContext, form: HTMLFormElement): void {
  const { config } = ctx;
  const log = ctx.logger(SCOPE);

  onElement(ctx, form, 'submit', SCOPE, event => {
    const message = validateContactForm(form, config.selectors.emailInput, config.invalidEmailMessage);
    if (!message) return;
    event.preventDefault();
    log.debug('Blocked contact form submission');
    config.notify(message);
  });
}
