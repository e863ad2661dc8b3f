/**
 * Security Middleware
 * Client identification, scanner filtering and response hardening headers
 */

import type { FastifyReply, FastifyRequest } from "fastify";
import { logger } from "../logger.js";

const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "1; mode=block",
  "Strict-Transport-Security": "max-age=31536000; includeSubDomains",
  "Referrer-Policy": "strict-origin-when-cross-origin",
  "Permissions-Policy": "geolocation=(), microphone=(), camera=()",
};

export class SecurityMiddleware {
  private static readonly SUSPICIOUS_USER_AGENTS = new Set([
    "sqlmap",
    "nikto",
    "dirb",
    "gobuster",
    "wfuzz",
    "masscan",
    "nmap",
    "zap",
    "burp",
    "acunetix",
    "nessus",
    "openvas",
  ]);

  /**
   * Refuse known scanners. Returns false when the reply has been sent.
   */
  checkSecurity(request: FastifyRequest, reply: FastifyReply): boolean {
    const userAgent = request.headers["user-agent"] || "unknown";
    const product = userAgent.toLowerCase().split("/")[0].trim();

    if (SecurityMiddleware.SUSPICIOUS_USER_AGENTS.has(product)) {
      logger.security("SUSPICIOUS_USER_AGENT", "WARNING", {
        clientIp: extractClientIP(request),
        userAgent,
        url: request.url,
        method: request.method,
      });
      reply.code(403).send({
        error: "Forbidden",
        message: "Request blocked by security policy",
      });
      return false;
    }

    return true;
  }

  applyHeaders(reply: FastifyReply): void {
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
      reply.header(name, value);
    }
  }
}

/**
 * Real client IP behind proxies. Also the rate-limit and session identity:
 * nothing the caller picks per request can change it.
 */
export function extractClientIP(request: FastifyRequest): string {
  // Priority order for IP extraction
  const ipSources = [
    request.headers["cf-connecting-ip"], // Cloudflare
    request.headers["x-real-ip"], // Nginx
    request.headers["x-forwarded-for"], // Load balancer
    request.ip, // Direct connection
  ];

  for (const ip of ipSources) {
    if (ip && typeof ip === "string") {
      // Handle comma-separated IPs (take first one)
      return ip.split(",")[0].trim();
    }
  }

  return "unknown";
}
