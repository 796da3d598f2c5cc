// src/session.ts
import fetch, { type RequestInit, type Response } from "node-fetch";
import { sleep } from "./utils.js";

export type Fetch = (url: string, init?: RequestInit) => Promise<Response>;

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36";
const LOGIN_MARKER = "https://accounts.sharif.edu/cas/login?service=https://edu.sharif.edu/login.jsp";
// ログイン後のページにだけある「خروج」（ログアウト）
const LOGGED_IN_MARKER = "خروج";
const MAX_REDIRECTS = 10;

export class StatusCodeError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`unexpected status code ${status} (${url})`);
    this.name = "StatusCodeError";
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

export class LoginRedirectError extends Error {
  constructor(readonly url: string) {
    super(`redirected to login page (${url})`);
    this.name = "LoginRedirectError";
  }
}

export class LoginError extends Error {
  constructor(message = "body is invalid (login probably failed)") {
    super(message);
    this.name = "LoginError";
  }
}

export function isLoginPage(body: string): boolean {
  return body.includes(LOGIN_MARKER);
}

function isExpired(attr: string): boolean {
  const m = /^\s*max-age\s*=\s*(-?\d+)\s*$/i.exec(attr);
  return m !== null && Number(m[1]) <= 0;
}

export type SessionOptions = {
  baseUrl: string;
  fetch?: Fetch;
  userAgent?: string;
  /** Pause between the first GET and the login POST. */
  loginDelayMs?: number;
  signal?: AbortSignal;
};

/**
 * Cookie-holding client for the registration site. One instance per login;
 * requests are expected to run one at a time.
 */
export class RegistrationSession {
  // オリジンごとの cookie
  private readonly cookies = new Map<string, Map<string, string>>();
  private readonly fetch: Fetch;
  private readonly baseUrl: string;
  private loggedIn = false;

  constructor(private readonly opts: SessionOptions) {
    this.fetch = opts.fetch ?? fetch;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  get isLoggedIn(): boolean {
    return this.loggedIn;
  }

  async login(username: string, password: string): Promise<void> {
    await this.request("GET", "/");
    await sleep(this.opts.loginDelayMs ?? 1000, this.opts.signal);

    const body = await this.request("POST", "/login.do", {
      username,
      password,
      jcaptcha: "ab",
      command: "login",
      captcha_key_name: "ab",
      captchaStatus: "ab",
    }, { checkLogin: false });
    if (!body.includes(LOGGED_IN_MARKER)) throw new LoginError();

    this.loggedIn = true;
    await this.warmUp();
  }

  // 授業一覧メニューを開いておかないと register.do が一覧を返さない
  private async warmUp(): Promise<void> {
    await this.request("POST", "/action.do", {
      changeMenu: "OnlineRegistration",
      isShowMenu: "",
      commandMessage: "",
      defaultCss: "",
    });
    await this.request("POST", "/register.do", {
      changeMenu: "OnlineRegistration*OfficalLessonListShow",
      isShowMenu: "",
    });
  }

  async fetchDepartment(departmentCode: number): Promise<string> {
    if (!this.loggedIn) throw new LoginError("not logged in");
    return this.request("POST", "/register.do", {
      level: "0",
      teacher_name: "",
      sort_item: "1",
      depID: String(departmentCode),
    });
  }

  private async request(
    method: "GET" | "POST",
    pathname: string,
    form?: Record<string, string>,
    { checkLogin = true }: { checkLogin?: boolean } = {},
  ): Promise<string> {
    let url = `${this.baseUrl}${pathname}`;
    let body: string | undefined = form ? new URLSearchParams(form).toString() : undefined;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers: Record<string, string> = { "User-Agent": this.opts.userAgent ?? USER_AGENT };
      if (body !== undefined) headers["Content-Type"] = "application/x-www-form-urlencoded";
      const cookie = this.cookieHeader(url);
      if (cookie) headers["Cookie"] = cookie;

      const res = await this.fetch(url, { method, headers, body, redirect: "manual", signal: this.opts.signal });
      this.storeCookies(res, url);

      const location = res.headers.get("location");
      if (res.status >= 300 && res.status < 400 && location) {
        url = new URL(location, url).toString();
        // 303 と 301/302 の POST はブラウザ同様 GET に切り替える
        if (res.status !== 307 && res.status !== 308) {
          method = "GET";
          body = undefined;
        }
        continue;
      }

      if (res.status !== 200) throw new StatusCodeError(res.status, url);
      const text = await res.text();
      if (checkLogin && isLoginPage(text)) throw new LoginRedirectError(url);
      return text;
    }
    throw new Error(`too many redirects (${url})`);
  }

  private storeCookies(res: Response, url: string) {
    const lines = res.headers.raw()["set-cookie"] ?? [];
    if (lines.length === 0) return;
    const origin = new URL(url).origin;
    const jar = this.cookies.get(origin) ?? new Map<string, string>();
    this.cookies.set(origin, jar);

    for (const line of lines) {
      const [pair, ...attrs] = line.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value === "" || attrs.some(isExpired)) jar.delete(name);
      else jar.set(name, value);
    }
  }

  private cookieHeader(url: string): string {
    const jar = this.cookies.get(new URL(url).origin);
    return jar ? [...jar].map(([k, v]) => `${k}=${v}`).join("; ") : "";
  }
}
