/**
 * HTML Interface
 *
 * The single page served at `/`: login screen, view selector, output pane
 * with search, pause/resume, countdown, info modal and light/dark theme.
 * All data is fetched from the `?action=` endpoints of the same origin.
 *
 * @module vipervault/html-interface
 */

import * as crypto from 'crypto';
import { viewsToJSON, type ViewConfig } from './config';
import { escapeAttribute, escapeHtml } from './output';

export interface PageOptions {
  title: string;
  views: ReadonlyMap<string, ViewConfig>;
  defaultRefresh: number;
  nonce: string;
}

export function createNonce(): string {
  return crypto.randomBytes(16).toString('base64url');
}

export function contentSecurityPolicy(nonce: string): string {
  return [
    "default-src 'self'",
    `script-src 'self' 'nonce-${nonce}'`,
    "style-src 'self' 'unsafe-inline'",
    "connect-src 'self'"
  ].join('; ') + ';';
}

/**
 * JSON that is safe inside a <script> element.
 */
export function scriptJSON(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

function renderOptions(views: ReadonlyMap<string, ViewConfig>): string {
  return Array.from(views.keys())
    .map(name => `        <option value="${escapeAttribute(name)}">${escapeHtml(name)}</option>`)
    .join('\n');
}

export function renderPage(options: PageOptions): string {
  const { nonce } = options;
  const title = escapeHtml(options.title);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <style>
    :root {
      --bg-color: #ffffff;
      --text-color: #000000;
      --log-bg: #f8f8f8;
      --log-border: #ccc;
      --timer-color: #555;
      --heading-color: #0066cc;
      --select-bg: #fff;
      --select-border: #ccc;
    }
    body.dark {
      --bg-color: #0d1117;
      --text-color: #c9d1d9;
      --log-bg: #161b22;
      --log-border: #30363d;
      --timer-color: #8b949e;
      --heading-color: #58a6ff;
      --select-bg: #21262d;
      --select-border: #30363d;
    }
    html, body { height: 100%; margin: 0; padding: 0; overflow: hidden; }
    body {
      font-family: monospace;
      background-color: var(--bg-color);
      color: var(--text-color);
      transition: background-color 0.3s, color 0.3s;
    }
    #login-screen {
      display: none; align-items: center; justify-content: center;
      height: 100vh; flex-direction: column; gap: 20px;
    }
    #login-screen h1 { color: var(--heading-color); margin: 0; }
    #login-form { display: flex; flex-direction: column; gap: 12px; min-width: 300px; }
    #login-form input {
      padding: 10px; font-family: monospace; font-size: 1em;
      background: var(--select-bg); color: var(--text-color);
      border: 1px solid var(--select-border); border-radius: 6px;
    }
    #login-form button {
      padding: 10px; font-family: monospace; font-size: 1em;
      background: var(--heading-color); color: white;
      border: none; border-radius: 6px; cursor: pointer;
    }
    #login-error { color: #d73a49; display: none; text-align: center; }
    #content {
      display: none; flex-direction: column;
      height: 100vh; padding: 20px; padding-top: 60px; box-sizing: border-box;
    }
    #controls { margin-bottom: 12px; display: flex; flex-wrap: wrap; gap: 12px; align-items: center; }
    select, #log-search {
      padding: 8px 12px; font-family: monospace;
      background: var(--select-bg); color: var(--text-color);
      border: 1px solid var(--select-border); border-radius: 6px;
    }
    select { min-width: 260px; }
    #search-container { position: relative; flex-grow: 1; display: flex; align-items: center; min-width: 200px; }
    #log-search { width: 100%; padding-right: 60px; }
    #search-tools {
      position: absolute; right: 10px; display: flex; align-items: center; gap: 8px;
      user-select: none; font-size: 0.8em;
    }
    #clear-search { cursor: pointer; font-weight: bold; color: var(--timer-color); display: none; }
    .regex-badge { color: var(--heading-color); opacity: 0.6; font-size: 0.7em; border: 1px solid; padding: 1px 3px; border-radius: 3px; }
    #log-output {
      flex-grow: 1; white-space: pre-wrap; background-color: var(--log-bg);
      border: 1px solid var(--log-border); padding: 12px; overflow-y: auto;
      border-radius: 6px; margin-bottom: 12px;
    }
    #status-bar { display: flex; align-items: center; gap: 12px; font-size: 0.9em; color: var(--timer-color); }
    #pause-btn {
      padding: 4px 12px; cursor: pointer; border: 1px solid var(--log-border);
      border-radius: 4px; font-family: monospace; font-weight: bold; color: white;
    }
    .btn-running { background-color: #d73a49 !important; }
    .btn-paused { background-color: #28a745 !important; }
    #top-controls { position: fixed; top: 15px; right: 20px; display: flex; gap: 8px; z-index: 100; }
    #theme-toggle, #logout-btn, #info-btn {
      padding: 8px 12px; background: var(--log-bg);
      border: 1px solid var(--log-border); color: var(--text-color);
      cursor: pointer; border-radius: 4px; font-size: 1.2em;
    }
    @media (max-width: 768px) {
      #content { padding-top: 20px; }
      #top-controls { position: static; margin-bottom: 12px; justify-content: flex-end; }
    }
    h1 { color: var(--heading-color); margin: 0 0 8px 0; }
    #info-modal {
      display: none; position: fixed; z-index: 1000;
      left: 0; top: 0; width: 100%; height: 100%;
      background-color: rgba(0,0,0,0.5);
    }
    .modal-content {
      background-color: var(--select-bg); margin: 15% auto; padding: 20px;
      border: 1px solid var(--log-border); border-radius: 8px;
      width: 80%; max-width: 600px; color: var(--text-color);
    }
    .modal-header { display: flex; justify-content: space-between; align-items: center; border-bottom: 1px solid var(--log-border); padding-bottom: 10px; }
    .modal-body { padding: 20px 0; line-height: 1.6; }
    .modal-body div { margin-bottom: 10px; word-break: break-all; }
    .modal-body code { background: var(--log-bg); padding: 2px 4px; border: 1px solid var(--log-border); }
    .close-modal { cursor: pointer; font-size: 1.5em; }
  </style>
</head>
<body>
  <div id="login-screen">
    <h1>${title}</h1>
    <form id="login-form">
      <input type="password" id="password-input" placeholder="Enter password" autocomplete="off">
      <button type="submit">Login</button>
      <div id="login-error">Invalid password. Please try again.</div>
    </form>
  </div>

  <div id="content">
    <div id="top-controls">
      <button id="info-btn" title="View Info">&#x2139;&#xFE0F;</button>
      <button id="theme-toggle">&#x1F319;</button>
      <button id="logout-btn" title="Logout">&#x1F6AA;</button>
    </div>
    <h1 id="log-title">${title}</h1>
    <div id="controls">
      <select id="log-selector">
        <option value="" disabled selected>Select log source...</option>
${renderOptions(options.views)}
      </select>
      <div id="search-container">
        <input type="text" id="log-search" placeholder="Press '/' to search..." autocomplete="off">
        <div id="search-tools">
          <span class="regex-badge">REGEX</span>
          <span id="clear-search">X</span>
        </div>
      </div>
    </div>
    <div id="log-output">Select a log source to begin...</div>
    <div id="status-bar">
      <button id="pause-btn" class="btn-running">Pause</button>
      <span id="timer"></span>
    </div>
  </div>

  <div id="info-modal">
    <div class="modal-content">
      <div class="modal-header">
        <h3 style="margin:0;">View Configuration</h3>
        <span class="close-modal">&times;</span>
      </div>
      <div id="info-body" class="modal-body"></div>
    </div>
  </div>

  <script nonce="${nonce}">
    const DEFAULT_INTERVAL = ${scriptJSON(options.defaultRefresh)};
    const LOG_CONFIG = ${scriptJSON(viewsToJSON(options.views))};
    const STORAGE_KEY = 'lastSelectedLogView';

    let rawLogData = '';
    let countdown;
    let refreshTimeout;
    let currentView = null;
    let isPaused = false;
    let isAuthenticated = false;

    const $ = (id) => document.getElementById(id);
    const loginScreen = $('login-screen');
    const contentDiv = $('content');
    const loginForm = $('login-form');
    const passwordInput = $('password-input');
    const loginError = $('login-error');
    const timerEl = $('timer');
    const pauseBtn = $('pause-btn');
    const searchInput = $('log-search');
    const clearSearchBtn = $('clear-search');
    const logOutput = $('log-output');
    const selector = $('log-selector');
    const infoModal = $('info-modal');
    const infoBody = $('info-body');

    function viewConfig(name) {
      return Object.prototype.hasOwnProperty.call(LOG_CONFIG, name) ? LOG_CONFIG[name] : undefined;
    }

    function getInterval() {
      const cfg = currentView ? viewConfig(currentView) : undefined;
      return cfg !== undefined ? cfg.refresh : DEFAULT_INTERVAL;
    }

    function scrollIfBottom() {
      const cfg = viewConfig(currentView);
      if (cfg && cfg.bottom === true) {
        logOutput.scrollTop = logOutput.scrollHeight;
      }
    }

    function applyFilter() {
      const term = searchInput.value;
      clearSearchBtn.style.display = term ? 'block' : 'none';

      if (!term) {
        logOutput.textContent = rawLogData;
        scrollIfBottom();
        return;
      }

      const lines = rawLogData.split('\\n');
      try {
        const regex = new RegExp(term, 'i');
        const filtered = lines.filter(line => regex.test(line)).join('\\n');
        logOutput.textContent = filtered || '-- No regex matches found --';
      } catch (e) {
        // Incomplete pattern while typing: plain substring match
        const lower = term.toLowerCase();
        const filtered = lines.filter(line => line.toLowerCase().includes(lower)).join('\\n');
        logOutput.textContent = filtered || '-- No matches found --';
      }
    }

    function stopTimers() {
      clearTimeout(refreshTimeout);
      clearInterval(countdown);
    }

    function startCountdown() {
      const interval = getInterval();
      if (isPaused || interval <= 0) return;
      let timeLeft = interval;
      clearInterval(countdown);

      countdown = setInterval(() => {
        if (isPaused) return;
        timeLeft--;
        timerEl.textContent = 'Next refresh in ' + timeLeft + 's (Rate: ' + getInterval() + 's)';
        if (timeLeft <= 0) {
          clearInterval(countdown);
          timerEl.textContent = 'Refreshing...';
        }
      }, 1000);
    }

    function showLogin(message) {
      isAuthenticated = false;
      contentDiv.style.display = 'none';
      loginScreen.style.display = 'flex';
      if (message) {
        loginError.textContent = message;
        loginError.style.display = 'block';
      } else {
        loginError.style.display = 'none';
      }
      stopTimers();
      passwordInput.focus();
    }

    function showContent() {
      isAuthenticated = true;
      loginScreen.style.display = 'none';
      contentDiv.style.display = 'flex';
      loginError.style.display = 'none';
      initTheme();

      const saved = localStorage.getItem(STORAGE_KEY);
      if (saved && viewConfig(saved) !== undefined) {
        selector.value = saved;
        triggerSelection(saved);
      } else if (selector.options.length > 1) {
        const first = selector.options[1].value;
        selector.value = first;
        triggerSelection(first);
      }
    }

    async function loadLogs() {
      if (!currentView || !isAuthenticated) return;
      clearTimeout(refreshTimeout);

      if (isPaused) {
        refreshTimeout = setTimeout(loadLogs, 1000);
        return;
      }

      const requested = currentView;
      try {
        const res = await fetch('?action=get_log&view=' + encodeURIComponent(requested), { credentials: 'same-origin' });
        const data = await res.text();
        if (requested !== currentView) return;

        if (data.startsWith('Unauthorized:')) {
          showLogin('Session expired. Please login again.');
          return;
        }
        if (!res.ok && res.status !== 500) throw new Error('HTTP ' + res.status);
        rawLogData = data;
        applyFilter();
        scrollIfBottom();

        const interval = getInterval();
        if (interval > 0) {
          startCountdown();
          refreshTimeout = setTimeout(loadLogs, interval * 1000);
        } else {
          clearInterval(countdown);
          timerEl.textContent = 'Auto-refresh disabled';
        }
      } catch (err) {
        console.error('Fetch error:', err);
        timerEl.textContent = 'Error fetching logs - retrying...';
        refreshTimeout = setTimeout(loadLogs, 5000);
      }
    }

    function infoRow(label, value, asCode) {
      const row = document.createElement('div');
      const strong = document.createElement('strong');
      strong.textContent = label + ': ';
      row.appendChild(strong);
      const valueEl = document.createElement(asCode ? 'code' : 'span');
      valueEl.textContent = value;
      row.appendChild(valueEl);
      return row;
    }

    $('info-btn').addEventListener('click', () => {
      infoBody.replaceChildren();
      const cfg = viewConfig(currentView);
      if (!cfg) {
        infoBody.textContent = 'No log source selected.';
      } else {
        infoBody.append(
          infoRow('Name', currentView, false),
          infoRow('Command', cfg.cmd, true),
          infoRow('Refresh Rate', cfg.refresh <= 0 ? 'Disabled' : cfg.refresh + 's', false),
          infoRow('Scroll to Bottom', cfg.bottom ? 'Enabled' : 'Disabled', false),
          infoRow('HTML Escaping (Safe)', cfg.safe_output ? 'Enabled' : 'Disabled', false)
        );
      }
      infoModal.style.display = 'block';
    });

    document.querySelector('.close-modal').addEventListener('click', () => {
      infoModal.style.display = 'none';
    });
    window.addEventListener('click', (e) => {
      if (e.target === infoModal) infoModal.style.display = 'none';
    });

    pauseBtn.addEventListener('click', () => {
      isPaused = !isPaused;
      pauseBtn.textContent = isPaused ? 'Resume' : 'Pause';
      if (isPaused) {
        pauseBtn.className = 'btn-paused';
        stopTimers();
        timerEl.textContent = '(Paused)';
      } else {
        pauseBtn.className = 'btn-running';
        loadLogs();
      }
    });

    function triggerSelection(viewName) {
      currentView = viewName;
      if (!currentView) return;

      const interval = getInterval();
      pauseBtn.style.display = interval > 0 ? 'block' : 'none';
      isPaused = false;
      pauseBtn.className = 'btn-running';
      pauseBtn.textContent = 'Pause';
      $('log-title').textContent = currentView;
      localStorage.setItem(STORAGE_KEY, currentView);

      logOutput.textContent = 'Loading...';
      stopTimers();
      timerEl.textContent = interval > 0
        ? 'Loading... (Refresh rate: ' + interval + 's)'
        : 'Loading... (Auto-refresh disabled)';

      loadLogs();
    }

    searchInput.addEventListener('input', applyFilter);
    clearSearchBtn.addEventListener('click', () => {
      searchInput.value = '';
      applyFilter();
      searchInput.focus();
    });

    document.addEventListener('keydown', (e) => {
      const isModalVisible = infoModal.style.display === 'block';
      const active = document.activeElement;

      if (e.key === 'Escape') {
        if (isModalVisible) {
          infoModal.style.display = 'none';
        } else if (active === searchInput) {
          searchInput.value = '';
          applyFilter();
          searchInput.blur();
        }
      } else if (e.key === '/' && !isModalVisible &&
                 active.tagName !== 'INPUT' && active.tagName !== 'TEXTAREA') {
        e.preventDefault();
        searchInput.focus();
      }
    });

    selector.addEventListener('change', () => triggerSelection(selector.value));

    loginForm.addEventListener('submit', async (e) => {
      e.preventDefault();
      try {
        const res = await fetch('?action=login', {
          method: 'POST',
          credentials: 'same-origin',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: new URLSearchParams({ password: passwordInput.value })
        });
        const body = await res.json();
        passwordInput.value = '';
        if (body.success) {
          showContent();
        } else {
          loginError.textContent = 'Invalid password. Please try again.';
          loginError.style.display = 'block';
          passwordInput.focus();
        }
      } catch (err) {
        loginError.textContent = 'Login error. Please try again.';
        loginError.style.display = 'block';
      }
    });

    $('logout-btn').addEventListener('click', async () => {
      try {
        await fetch('?action=logout', { method: 'POST', credentials: 'same-origin' });
      } finally {
        currentView = null;
        showLogin();
      }
    });

    function setTheme(t) {
      const toggle = $('theme-toggle');
      if (t === 'dark') {
        document.body.classList.add('dark');
        toggle.textContent = '\\u2600\\uFE0F';
      } else {
        document.body.classList.remove('dark');
        toggle.textContent = '\\uD83C\\uDF19';
      }
      localStorage.setItem('theme', t);
    }

    function initTheme() {
      const savedTheme = localStorage.getItem('theme');
      if (savedTheme) {
        setTheme(savedTheme);
      } else if (window.matchMedia && window.matchMedia('(prefers-color-scheme: dark)').matches) {
        setTheme('dark');
      } else {
        setTheme('light');
      }
    }

    $('theme-toggle').addEventListener('click', () => {
      setTheme(document.body.classList.contains('dark') ? 'light' : 'dark');
    });

    async function checkExistingSession() {
      try {
        const res = await fetch('?action=check_session', { credentials: 'same-origin' });
        const body = await res.json();
        if (body.authenticated) {
          showContent();
        } else {
          showLogin();
        }
      } catch (err) {
        showLogin();
      }
    }

    window.addEventListener('load', () => {
      initTheme();
      checkExistingSession();
    });
  </script>
</body>
</html>`;
}
