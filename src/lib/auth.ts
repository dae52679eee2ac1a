// Caller identity: user passwords + JWTs, OAuth2 client credentials + opaque tokens.
import bcrypt from "bcryptjs"
import { SignJWT, jwtVerify } from "jose"
import { ALL_SCOPES, parseScopes, type Caller, type ClientCaller, type Scope } from "../../core/domain/caller.js"
import {
  getClient,
  findActiveToken,
  insertClient,
  insertToken,
  revokeClientTokens,
  revokeTokenByHash,
  setClientSecret,
  touchClient,
  withoutSecret,
  type OAuthClient,
} from "../../infra/db/clients.js"
import { isUniqueViolation, type Db } from "../../infra/db/database.js"
import {
  countUsers,
  findUserByUsername,
  insertUser,
  toPublicUser,
  userExists,
  type PublicUser,
  type UserRow,
} from "../../infra/db/users.js"
import { randomToken, sha256Hex } from "./crypto.js"
import { notFound, unauthorized, validationError } from "./errors.js"
import type { Logger } from "./log.js"

export const CLIENT_ID_PREFIX = "sl_"
export const CLIENT_TOKEN_PREFIX = "sl_access_"

type JwtKind = "access" | "refresh"

export type AuthOptions = {
  jwtSecret: string
  accessTokenExpireMinutes: number
  refreshTokenExpireDays: number
  clientTokenExpireSeconds: number
  defaultRateLimitPerHour: number
  bcryptRounds?: number
}

export type TokenPair = {
  access_token: string
  refresh_token: string
  token_type: "bearer"
}

export type ClientToken = {
  access_token: string
  token_type: "Bearer"
  expires_in: number
  scope: string
}

export type ClientWithSecret = OAuthClient & { client_secret: string }

// The client row travels with client callers so the rate limiter needs no second lookup.
export type ResolvedCaller = { caller: Caller; client: OAuthClient | null }

export class AuthService {
  private readonly key: Uint8Array
  private readonly rounds: number

  constructor(
    private readonly db: Db,
    private readonly opts: AuthOptions,
    private readonly clock: () => Date,
    private readonly log: Logger
  ) {
    this.key = new TextEncoder().encode(opts.jwtSecret)
    this.rounds = opts.bcryptRounds ?? 10
  }

  // ---------- users ----------

  async register(input: { email: string; username: string; password: string }): Promise<PublicUser> {
    if (userExists(this.db, input.username, input.email)) {
      throw validationError("Username or email already registered")
    }
    const hashedPassword = await bcrypt.hash(input.password, this.rounds)

    // Re-checked by the UNIQUE constraints: a concurrent registration may have won during the hash.
    let user: UserRow
    try {
      user = this.db.transaction(() =>
        insertUser(this.db, {
          email: input.email,
          username: input.username,
          hashedPassword,
          isSuperAdmin: countUsers(this.db) === 0,
          now: this.clock().toISOString(),
        })
      )()
    } catch (e: unknown) {
      if (isUniqueViolation(e)) throw validationError("Username or email already registered")
      throw e
    }
    const isSuperAdmin = user.is_super_admin === 1
    this.log.info("user_registered", { userId: user.id, superAdmin: isSuperAdmin })
    return toPublicUser(user)
  }

  async login(username: string, password: string): Promise<TokenPair> {
    const user = findUserByUsername(this.db, username)
    const ok = user ? await bcrypt.compare(password, user.hashed_password) : false
    if (!user || !ok) throw unauthorized("Incorrect username or password")
    if (user.is_active !== 1) throw unauthorized("Inactive user")
    return this.tokenPair(user.username)
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const username = await this.verifyJwt(refreshToken, "refresh")
    const user = findUserByUsername(this.db, username)
    if (!user || user.is_active !== 1) throw unauthorized("Invalid refresh token")
    return this.tokenPair(user.username)
  }

  private async tokenPair(username: string): Promise<TokenPair> {
    return {
      access_token: await this.signJwt(username, "access", this.opts.accessTokenExpireMinutes * 60),
      refresh_token: await this.signJwt(username, "refresh", this.opts.refreshTokenExpireDays * 86400),
      token_type: "bearer",
    }
  }

  private signJwt(sub: string, type: JwtKind, ttlSeconds: number): Promise<string> {
    const iat = Math.floor(this.clock().getTime() / 1000)
    return new SignJWT({ type })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(sub)
      .setJti(randomToken(9))
      .setIssuedAt(iat)
      .setExpirationTime(iat + ttlSeconds)
      .sign(this.key)
  }

  private async verifyJwt(token: string, type: JwtKind): Promise<string> {
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: ["HS256"], currentDate: this.clock() })
      if (payload.type !== type || typeof payload.sub !== "string") throw new Error("JWT_WRONG_KIND")
      return payload.sub
    } catch {
      throw unauthorized(type === "refresh" ? "Invalid refresh token" : "Could not validate credentials")
    }
  }

  // ---------- OAuth2 clients ----------

  async createClient(input: {
    name: string
    description?: string | null
    scopes?: Scope[]
    rateLimitPerHour?: number
    createdBy: number | null
  }): Promise<ClientWithSecret> {
    const clientId = `${CLIENT_ID_PREFIX}${randomToken(16)}`
    const secret = randomToken(32)

    const client = insertClient(this.db, {
      clientId,
      secretHash: await bcrypt.hash(secret, this.rounds),
      name: input.name,
      description: input.description ?? null,
      scopes: input.scopes?.length ? input.scopes : [...ALL_SCOPES],
      rateLimitPerHour: input.rateLimitPerHour ?? this.opts.defaultRateLimitPerHour,
      createdBy: input.createdBy,
      now: this.clock().toISOString(),
    })
    this.log.info("client_created", { clientId, createdBy: input.createdBy })
    return { ...withoutSecret(client), client_secret: secret }
  }

  /**
   * New secret for an existing client. Every outstanding token is revoked.
   */
  async regenerateSecret(clientId: string): Promise<{ client_id: string; client_secret: string }> {
    if (!getClient(this.db, clientId)) throw notFound("Client not found")

    const secret = randomToken(32)
    setClientSecret(this.db, clientId, await bcrypt.hash(secret, this.rounds), this.clock().toISOString())
    const revoked = revokeClientTokens(this.db, clientId)

    this.log.info("client_secret_regenerated", { clientId, revokedTokens: revoked })
    return { client_id: clientId, client_secret: secret }
  }

  /**
   * client_credentials grant. The requested scope must be a subset of the
   * client's own scopes; when omitted, all of them are granted.
   */
  async issueClientToken(input: { clientId: string; clientSecret: string; scope?: string }): Promise<ClientToken> {
    const client = getClient(this.db, input.clientId)
    const ok = client ? await bcrypt.compare(input.clientSecret, client.client_secret_hash) : false
    if (!client || !ok || !client.is_active) throw unauthorized("Invalid client credentials")

    let scopes: Scope[] = client.scopes
    if (input.scope?.trim()) {
      const requested = parseScopes(input.scope)
      if (!requested || requested.some((s) => !client.scopes.includes(s))) {
        throw validationError("Requested scope is not allowed for this client", {
          requested: input.scope,
          allowed: client.scopes,
        })
      }
      scopes = requested
    }

    const now = this.clock()
    const token = `${CLIENT_TOKEN_PREFIX}${randomToken(32)}`
    insertToken(this.db, {
      tokenHash: sha256Hex(token),
      clientId: client.client_id,
      scopes,
      expiresAt: new Date(now.getTime() + this.opts.clientTokenExpireSeconds * 1000).toISOString(),
      now: now.toISOString(),
    })
    touchClient(this.db, client.client_id, now.toISOString())

    this.log.info("client_token_issued", { clientId: client.client_id, scopes })
    return {
      access_token: token,
      token_type: "Bearer",
      expires_in: this.opts.clientTokenExpireSeconds,
      scope: scopes.join(" "),
    }
  }

  // A client may only revoke its own tokens.
  revokeClientToken(caller: ClientCaller, token: string): boolean {
    return revokeTokenByHash(this.db, sha256Hex(token), caller.clientId)
  }

  // ---------- bearer resolution ----------

  async resolveBearer(token: string): Promise<ResolvedCaller> {
    if (token.startsWith(CLIENT_TOKEN_PREFIX)) {
      const nowIso = this.clock().toISOString()
      const found = findActiveToken(this.db, sha256Hex(token), nowIso)
      if (!found) throw unauthorized("Invalid or expired token")

      touchClient(this.db, found.client.client_id, nowIso)
      return {
        caller: { kind: "client", clientId: found.client.client_id, scopes: found.token.scopes },
        client: withoutSecret(found.client),
      }
    }

    const username = await this.verifyJwt(token, "access")
    const user = findUserByUsername(this.db, username)
    if (!user) throw unauthorized()
    if (user.is_active !== 1) throw unauthorized("Inactive user")

    return {
      caller: { kind: "user", userId: user.id, username: user.username, isSuperAdmin: user.is_super_admin === 1 },
      client: null,
    }
  }
}
