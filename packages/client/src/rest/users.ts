import { ApiHttpClient } from "./http.js";
import { createdSchema, jsonSchema, tokenSchema } from "./schemas.js";

export interface UserProfile {
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
  phoneNumber?: string;
  gender?: string;
  dateOfBirth?: string;
  heightCm?: string | number;
  weightKg?: string | number;
}

/**
 * Wire representation of a user, omitting unset fields
 */
export function toUserData(profile: UserProfile): Record<string, string> {
  const fields: Record<string, string | number | undefined> = {
    FirstName: profile.firstName,
    LastName: profile.lastName,
    Email: profile.email,
    Password: profile.password,
    PhoneNumber: profile.phoneNumber,
    Gender: profile.gender,
    DateOfBirth: profile.dateOfBirth,
    HeightCm: profile.heightCm,
    WeightKg: profile.weightKg,
  };

  const data: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      data[key] = String(value);
    }
  }
  return data;
}

/**
 * User endpoints (20x)
 */
export class Users {
  constructor(private readonly http: ApiHttpClient) {}

  /**
   * 200 POST /users
   */
  async create(token: string, profile: UserProfile): Promise<string> {
    const res = await this.http.request(
      "users.create",
      { method: "POST", path: "/users", token, body: toUserData(profile) },
      createdSchema
    );
    return res.ID;
  }

  /**
   * 201 POST /users/auth
   */
  async login(token: string, email: string, password: string): Promise<string> {
    const res = await this.http.request(
      "users.login",
      {
        method: "POST",
        path: "/users/auth",
        token,
        body: { Email: email, Password: password },
      },
      tokenSchema
    );
    return res.Token;
  }

  /**
   * 202 GET /users
   */
  retrieve(token: string): Promise<unknown> {
    return this.http.request(
      "users.retrieve",
      { method: "GET", path: "/users", token },
      jsonSchema
    );
  }

  /**
   * 206 DELETE /users
   */
  remove(token: string): Promise<unknown> {
    return this.http.request(
      "users.remove",
      { method: "DELETE", path: "/users", token },
      jsonSchema
    );
  }

  /**
   * 211 GET /users/role
   */
  getRole(token: string): Promise<unknown> {
    return this.http.request(
      "users.getRole",
      { method: "GET", path: "/users/role", token },
      jsonSchema
    );
  }
}
