import { ApiHttpClient } from "./http.js";
import { toUserData, type UserProfile } from "./users.js";
import { createdSchema, licenseSchema, tokenSchema } from "./schemas.js";
import { CLIENT_IDENTIFIER, CLIENT_VERSION } from "../constants.js";

export interface DeviceRegistration {
  token: string;
  deviceId?: string;
}

/**
 * Organization endpoints (70x)
 */
export class Organizations {
  constructor(
    private readonly http: ApiHttpClient,
    private readonly licenseKey: string
  ) {}

  /**
   * 705 POST /organizations/licenses
   */
  async registerLicense(deviceName: string): Promise<DeviceRegistration> {
    const res = await this.http.request(
      "organizations.registerLicense",
      {
        method: "POST",
        path: "/organizations/licenses",
        body: {
          Key: this.licenseKey,
          DeviceTypeID: "LINUX",
          Name: deviceName,
          Identifier: CLIENT_IDENTIFIER,
          Version: CLIENT_VERSION,
        },
      },
      licenseSchema
    );
    return { token: res.Token, deviceId: res.DeviceID };
  }

  /**
   * 713 POST /organizations/users
   */
  async createUser(token: string, profile: UserProfile): Promise<string> {
    const res = await this.http.request(
      "organizations.createUser",
      {
        method: "POST",
        path: "/organizations/users",
        token,
        body: toUserData(profile),
      },
      createdSchema
    );
    return res.ID;
  }

  /**
   * 717 POST /organizations/auth
   */
  async login(
    token: string,
    email: string,
    password: string,
    organizationId: string
  ): Promise<string> {
    const res = await this.http.request(
      "organizations.login",
      {
        method: "POST",
        path: "/organizations/auth",
        token,
        body: { Email: email, Password: password, Identifier: organizationId },
      },
      tokenSchema
    );
    return res.Token;
  }
}
