export const SITE_MARKUP = `
  <button class="navbar-toggle" type="button" aria-expanded="false">Menu</button>
  <ul id="primary-navigation" class="nav-list">
    <li><a id="home-link" href="#home">Home</a></li>
    <li class="dropdown" id="services">
      <a href="#services" class="dropbtn" id="services-trigger">Services</a>
      <ul><li><a id="api-link" href="#api">API</a></li></ul>
    </li>
    <li class="dropdown" id="about">
      <a href="#about" class="dropbtn" id="about-trigger">About</a>
      <ul><li><a href="#team">Team</a></li></ul>
    </li>
  </ul>
  <article class="service-card interactive" id="service-card"></article>
  <article class="price-card interactive" id="price-card"></article>
  <article class="service-card" id="static-card"></article>
  <button class="preview-btn" id="preview-one" data-preview-url="https://example.com/one" data-preview-title="Project One">Preview</button>
  <button class="preview-btn" id="preview-untitled" data-preview-url="https://example.com/two">Preview</button>
  <button class="preview-btn" id="preview-broken">Preview</button>
  <form class="contact-form" action="#sent">
    <input type="text" name="name" value="Sam" />
    <input type="email" name="email" id="email" />
  </form>
  <div id="portfolioPreviewModal" hidden>
    <div class="portfolio-modal-content" id="modal-content">
      <h2 class="portfolio-modal-title"></h2>
      <button class="portfolio-modal-close" type="button">Close</button>
      <iframe title="preview"></iframe>
    </div>
  </div>
`;

export function mount(markup: string = SITE_MARKUP): void {
  document.body.innerHTML = markup;
  document.body.className = '';
}

export function byId(id: string): HTMLElement {
  const el = document.getElementById(id);
  if (!el) throw new Error(`Missing #${id} in test DOM.`);
  return el;
}

export function query<T extends Element>(selector: string, type: { new (): T }): T {
  const el = document.querySelector(selector);
  if (!(el instanceof type)) throw new Error(`Missing ${selector} in test DOM.`);
  return el;
}

export function pressKey(key: string): void {
  document.dispatchEvent(new KeyboardEvent('keydown', { key, bubbles: true }));
}

export function touch(target: HTMLElement, type: 'touchstart' | 'touchend', clientX: number): void {
  const list = [{ clientX }];
  const event = Object.assign(new Event(type, { bubbles: true }), {
    touches: type === 'touchstart' ? list : [],
    changedTouches: list
  });
  target.dispatchEvent(event);
}
