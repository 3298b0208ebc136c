import fs from "node:fs";
import dotenv from "dotenv";
import { createPlatformApp } from "./app";
import { getConfig, type PlatformBackendConfig } from "./config";
import { emitPlatformLog } from "./logging/platform-logs";
import { resolveBackendPath } from "./runtime-paths";
import { loadClientProfiles, type ClientProfileDirectory } from "./services/client-profiles.service";

const backendEnvPath = resolveBackendPath(".env");
const backendEnvLocalPath = resolveBackendPath(".env.local");

dotenv.config();

if (fs.existsSync(backendEnvPath)) {
  dotenv.config({ path: backendEnvPath, override: true });
}

if (fs.existsSync(backendEnvLocalPath)) {
  dotenv.config({ path: backendEnvLocalPath, override: true });
}

function bootstrap(): { config: PlatformBackendConfig; profiles: ClientProfileDirectory } {
  try {
    const config = getConfig();
    return { config, profiles: loadClientProfiles(config.clientProfilesFile) };
  } catch (error) {
    console.error(error instanceof Error ? error.message : "Invalid configuration.");
    process.exit(1);
  }
}

const { config, profiles } = bootstrap();
const { app } = createPlatformApp(config, profiles);

app.listen(config.port, () => {
  emitPlatformLog({
    scope: "server",
    action: "listen",
    status: "started",
    clientId: null,
    company: null,
    detail: { port: config.port, clients: profiles.listIds().length, partners: config.partnerCompanies.length },
  });
  console.log(`Bank analytics backend listening on port ${config.port}`);
});
