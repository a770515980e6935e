/**
 * Steam login check through SteamCMD (`+login ... +quit`).
 */

import type { Logger } from "../logger.ts";
import { buildLoginArgs, type Credentials, type ProcessRunner } from "./process-runner.ts";

export const LOGIN_FAILURE_MARKERS: readonly string[] = ["Login Failure", "FAILED"];

export interface LoginResult {
  ok: boolean;
  message: string;
}

export interface Authenticator {
  login(credentials: Credentials): Promise<LoginResult>;
}

export function isLoginFailure(output: string): boolean {
  return LOGIN_FAILURE_MARKERS.some((marker) => output.includes(marker));
}

export function createAuthenticator(
  config: { steamcmdPath: string },
  runner: ProcessRunner,
  log: Logger,
): Authenticator {
  async function login(credentials: Credentials): Promise<LoginResult> {
    if (credentials.anonymous) {
      log.info("Logging in anonymously...");
    } else {
      log.info(`Logging in as ${credentials.username}...`);
    }

    const result = await runner.run(config.steamcmdPath, [...buildLoginArgs(credentials), "+quit"]);

    // run() reports spawn errors as code -1 instead of throwing
    if (result.code === -1 && !result.stdout) {
      log.error("Login error", { error: result.stderr });
      return { ok: false, message: `Login error: ${result.stderr}` };
    }

    if (isLoginFailure(result.stdout)) {
      log.error("Login failed");
      return { ok: false, message: "Login failed. Please check your credentials." };
    }

    log.info("Login successful");
    return { ok: true, message: "Login successful" };
  }

  return { login };
}
