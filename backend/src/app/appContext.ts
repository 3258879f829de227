import type { AppConfig } from '../shared/config/appConfig.js';
import type { CollectionStores } from '../shared/storage/storeFactory.js';
import { createAnalysesModule } from '../modules/analyses/analyses.module.js';
import type { RelevanceAnalyzer } from '../modules/analyses/analyses.types.js';
import { AdminService } from '../modules/admin/admin.service.js';
import { createAuthModule } from '../modules/auth/auth.module.js';
import type { SessionStore } from '../modules/auth/auth.types.js';
import { InMemorySessionStore } from '../modules/auth/sessionStore.js';
import { createJobsModule } from '../modules/jobs/jobs.module.js';
import { RequestLogsRepository } from '../modules/requestLogs/requestLogs.repository.js';
import { createResumesModule } from '../modules/resumes/resumes.module.js';

export type AppContextOptions = {
  config: AppConfig;
  stores: CollectionStores;
  sessions?: SessionStore;
  /** Replaces the analyzer derived from the OpenAI settings; null forces the mock scorer. */
  analyzer?: RelevanceAnalyzer | null;
};

export const createAppContext = ({ config, stores, sessions, analyzer }: AppContextOptions) => {
  const resumes = createResumesModule(stores.resumes);
  const jobs = createJobsModule(stores.jobs);
  const analyses = createAnalysesModule({
    store: stores.analyses,
    resumes: resumes.repository,
    jobs: jobs.repository,
    openAi: config.openAi,
    analyzer
  });
  const auth = createAuthModule(
    stores.users,
    sessions ?? new InMemorySessionStore({ ttlMs: config.sessionTtlMs }),
    config.adminUsername
  );
  const requestLogs = new RequestLogsRepository(stores.logs);

  return {
    config,
    resumesService: resumes.service,
    jobsService: jobs.service,
    analysesService: analyses.service,
    authService: auth.service,
    adminService: new AdminService(auth.service, requestLogs),
    requestLogs
  };
};

export type AppContext = ReturnType<typeof createAppContext>;
