import { DefaultAzureCredential } from "@azure/identity";
import type { TokenCredential } from "@azure/identity";

let credential: TokenCredential | undefined;

/**
 * Managed identity in Azure, developer sign-in (az login, VS Code) locally.
 * One credential per worker process so its token cache is shared by all
 * clients and invocations.
 */
export function getCredential(): TokenCredential {
  credential ??= new DefaultAzureCredential();
  return credential;
}
