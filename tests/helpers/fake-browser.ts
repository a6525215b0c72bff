/**
 * Browser Test Helper
 *
 * Plays the user's browser: opens the local URL, reads the provider URL from
 * the redirect and comes back to redirect_uri with the query it is given.
 */

import axios from 'axios';
import type { BrowserOpener } from '../../src/lib/auth/browser';

const http = axios.create({ maxRedirects: 0, validateStatus: () => true });

export interface BrowserVisit {
  localUrl: string;
  redirectStatus: number;
  location: string;
  callbackStatus: number;
  callbackBody: string;
}

export class FakeBrowser {
  visit: Promise<BrowserVisit> | null = null;

  constructor(private readonly callbackQuery: (state: string) => string) {}

  readonly open: BrowserOpener = (url) => {
    const visit = this.navigate(url);
    this.visit = visit;
    return visit.then(() => undefined);
  };

  private async navigate(localUrl: string): Promise<BrowserVisit> {
    const redirect = await http.get<string>(localUrl);
    const location = String(redirect.headers['location']);
    const authUrl = new URL(location);
    const state = authUrl.searchParams.get('state') ?? '';
    const redirectUri = authUrl.searchParams.get('redirect_uri') ?? localUrl;

    const callback = await http.get<string>(`${redirectUri}/?${this.callbackQuery(state)}`);
    return {
      localUrl,
      redirectStatus: redirect.status,
      location,
      callbackStatus: callback.status,
      callbackBody: callback.data,
    };
  }
}
