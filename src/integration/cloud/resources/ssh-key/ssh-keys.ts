// SPDX-License-Identifier: Apache-2.0

export interface SshKeys {
  /**
   * Make the public key usable for `user` on every instance of the project
   * @param user - the login name on the instances
   * @param publicKey - the public key in OpenSSH format
   * @returns true when the key was added, false when it was already present
   */
  register(user: string, publicKey: string): Promise<boolean>;
}
