import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

/**
 * Throws when `path` needs a key and `apiKey` does not match. No configured key leaves the API open.
 */
export function authorizeApiKey(path: string, apiKey: string | undefined, expected: string | undefined): true {
  if (path === "/health" || !expected) {
    return true;
  }

  if (!apiKey) {
    throw new UnauthorizedException("Missing x-api-key header.");
  }

  if (apiKey !== expected) {
    throw new UnauthorizedException("Invalid API key.");
  }

  return true;
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const path = req.path ?? req.url;
    return authorizeApiKey(path, req.header("x-api-key"), this.configService.load().apiKey);
  }
}
