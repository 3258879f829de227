import type { AuthService } from '../auth/auth.service.js';
import type { RequestLogsRepository } from '../requestLogs/requestLogs.repository.js';

export const ADMIN_LOG_LIMIT = 200;

export class AdminService {
  constructor(
    private readonly authService: AuthService,
    private readonly requestLogs: RequestLogsRepository
  ) {}

  async getOverview() {
    const [users, logs] = await Promise.all([
      this.authService.listUsers(),
      this.requestLogs.listRecent(ADMIN_LOG_LIMIT)
    ]);
    return { users, logs };
  }
}
