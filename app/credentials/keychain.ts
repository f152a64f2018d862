/**
 * OS Keychain Integration
 *
 * Uses native OS keychain via child_process.execFile, with no npm dependencies.
 * - macOS: security (Keychain Services)
 * - Windows: cmdkey.exe + PowerShell P/Invoke (advapi32.dll CredRead)
 * - Linux: secret-tool (libsecret)
 *
 * Entries are addressed by (service, account); the service is the
 * application namespace, the account is `<provider>_api_key`.
 */

import { execFile } from 'child_process';
import { platform } from 'os';

/**
 * Minimal secure-storage capability. `load` resolves to null when the entry
 * does not exist; every other failure rejects.
 */
export interface SecretBackend {
  isAvailable(): Promise<boolean>;
  load(service: string, account: string): Promise<string | null>;
  save(service: string, account: string, secret: string): Promise<void>;
  delete(service: string, account: string): Promise<void>;
}

interface PlatformKeychain {
  save(service: string, account: string, key: string): Promise<void>;
  load(service: string, account: string): Promise<string | null>;
  delete(service: string, account: string): Promise<void>;
  probe(): Promise<boolean>;
}

function exec(cmd: string, args: string[], stdin?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = execFile(cmd, args, { timeout: 10_000 }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(stderr?.trim() || error.message));
      } else {
        resolve(stdout.trim());
      }
    });
    if (stdin !== undefined && child.stdin) {
      child.stdin.write(stdin);
      child.stdin.end();
    }
  });
}

// ---------------------------------------------------------------------------
// macOS
// ---------------------------------------------------------------------------
const macOS: PlatformKeychain = {
  async save(service, account, key) {
    await exec('security', [
      'add-generic-password',
      '-a', account,
      '-s', service,
      '-w', key,
      '-U', // update if exists
    ]);
  },

  async load(service, account) {
    try {
      const result = await exec('security', [
        'find-generic-password',
        '-a', account,
        '-s', service,
        '-w',
      ]);
      return result || null;
    } catch {
      // exits non-zero when the item is missing
      return null;
    }
  },

  async delete(service, account) {
    try {
      await exec('security', [
        'delete-generic-password',
        '-a', account,
        '-s', service,
      ]);
    } catch {
      // Ignore if not found
    }
  },

  async probe() {
    try {
      await exec('which', ['security']);
      return true;
    } catch {
      return false;
    }
  },
};

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

/** Windows credential target: combine service + account */
function windowsTarget(service: string, account: string): string {
  return `${service}/${account}`;
}

const windows: PlatformKeychain = {
  async save(service, account, key) {
    const t = windowsTarget(service, account);
    try {
      await exec('cmdkey.exe', [`/delete:${t}`]);
    } catch {
      // Ignore if not found
    }
    await exec('cmdkey.exe', [
      `/generic:${t}`,
      `/user:${account}`,
      `/pass:${key}`,
    ]);
  },

  async load(service, account) {
    const t = windowsTarget(service, account).replace(/"/g, '""');
    const psScript = `
Add-Type -Namespace Win32 -Name Cred -MemberDefinition @"
  [DllImport("advapi32.dll", SetLastError=true, CharSet=CharSet.Unicode)]
  public static extern bool CredRead(string target, int type, int flags, out IntPtr cred);
  [DllImport("advapi32.dll")]
  public static extern void CredFree(IntPtr cred);
  [StructLayout(LayoutKind.Sequential, CharSet=CharSet.Unicode)]
  public struct CREDENTIAL {
    public int Flags; public int Type; public string TargetName;
    public string Comment; public long LastWritten; public int CredentialBlobSize;
    public IntPtr CredentialBlob; public int Persist; public int AttributeCount;
    public IntPtr Attributes; public string TargetAlias; public string UserName;
  }
"@
[IntPtr]$ptr = [IntPtr]::Zero
if ([Win32.Cred]::CredRead("${t}",1,0,[ref]$ptr)) {
  $c = [Runtime.InteropServices.Marshal]::PtrToStructure($ptr, [Type][Win32.Cred+CREDENTIAL])
  [Runtime.InteropServices.Marshal]::PtrToStringUni($c.CredentialBlob, $c.CredentialBlobSize/2)
  [Win32.Cred]::CredFree($ptr)
} else { "" }
`;
    const result = await exec('powershell.exe', ['-NoProfile', '-Command', psScript]);
    return result || null;
  },

  async delete(service, account) {
    try {
      await exec('cmdkey.exe', [`/delete:${windowsTarget(service, account)}`]);
    } catch {
      // Ignore if not found
    }
  },

  async probe() {
    try {
      await exec('cmdkey.exe', ['/list']);
      return true;
    } catch {
      return false;
    }
  },
};

// ---------------------------------------------------------------------------
// Linux (secret-tool / libsecret)
// ---------------------------------------------------------------------------
const linux: PlatformKeychain = {
  async save(service, account, key) {
    await exec(
      'secret-tool',
      ['store', `--label=${service} ${account}`, 'service', service, 'account', account],
      key,
    );
  },

  async load(service, account) {
    try {
      const result = await exec('secret-tool', [
        'lookup',
        'service', service,
        'account', account,
      ]);
      return result || null;
    } catch {
      // lookup exits 1 when nothing matches
      return null;
    }
  },

  async delete(service, account) {
    try {
      await exec('secret-tool', [
        'clear',
        'service', service,
        'account', account,
      ]);
    } catch {
      // Ignore if not found
    }
  },

  async probe() {
    try {
      await exec('which', ['secret-tool']);
      return true;
    } catch {
      return false;
    }
  },
};

// ---------------------------------------------------------------------------
// Platform dispatch
// ---------------------------------------------------------------------------

function getBackend(os: NodeJS.Platform): PlatformKeychain | null {
  if (os === 'darwin') return macOS;
  if (os === 'win32') return windows;
  if (os === 'linux') return linux;
  return null;
}

/**
 * SecretBackend over the platform keychain tools. Availability is probed
 * once; an unavailable keychain rejects writes and resolves reads to null.
 */
export class OsKeychain implements SecretBackend {
  private readonly backend: PlatformKeychain | null;
  private available: Promise<boolean> | null = null;

  constructor(os: NodeJS.Platform = platform()) {
    this.backend = getBackend(os);
  }

  isAvailable(): Promise<boolean> {
    if (!this.available) {
      const backend = this.backend;
      this.available = backend ? backend.probe().catch(() => false) : Promise.resolve(false);
    }
    return this.available;
  }

  async load(service: string, account: string): Promise<string | null> {
    if (!this.backend || !(await this.isAvailable())) return null;
    return this.backend.load(service, account);
  }

  async save(service: string, account: string, secret: string): Promise<void> {
    if (!this.backend || !(await this.isAvailable())) {
      throw new Error('System keychain is not available on this platform');
    }
    await this.backend.save(service, account, secret);
  }

  async delete(service: string, account: string): Promise<void> {
    if (!this.backend || !(await this.isAvailable())) return;
    await this.backend.delete(service, account);
  }
}

/**
 * Keychain account name for a provider's API key
 */
export function apiKeyAccount(provider: string): string {
  return `${provider}_api_key`;
}
