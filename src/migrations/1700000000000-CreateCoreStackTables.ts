import { MigrationInterface, QueryRunner } from 'typeorm';

const AUDIT = `
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()`;

export class CreateCoreStackTables1700000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS users (
        id VARCHAR(36) PRIMARY KEY,
        email VARCHAR(120) NOT NULL UNIQUE,
        password_hash VARCHAR(256) NOT NULL,
        role VARCHAR(20) NOT NULL DEFAULT 'employee',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        last_login VARCHAR(32),${AUDIT}
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS departments (
        id VARCHAR(36) PRIMARY KEY,
        name VARCHAR(100) NOT NULL UNIQUE,
        description TEXT,${AUDIT}
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS employees (
        id VARCHAR(36) PRIMARY KEY,
        user_id VARCHAR(36) NOT NULL REFERENCES users(id),
        department_id VARCHAR(36) REFERENCES departments(id),
        first_name VARCHAR(50) NOT NULL,
        last_name VARCHAR(50) NOT NULL,
        employee_code VARCHAR(20) NOT NULL UNIQUE,
        position VARCHAR(100),
        date_of_birth DATE,
        date_of_joining DATE NOT NULL,
        phone_number VARCHAR(20),
        address TEXT,
        gender VARCHAR(10),
        manager_id VARCHAR(36) REFERENCES employees(id),
        profile_image VARCHAR(255),${AUDIT},
        deleted_at TIMESTAMPTZ
      );
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX IF NOT EXISTS idx_employees_user ON employees(user_id);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        date DATE NOT NULL,
        clock_in VARCHAR(32),
        clock_out VARCHAR(32),
        status VARCHAR(20) NOT NULL DEFAULT 'present',
        work_from VARCHAR(20) NOT NULL DEFAULT 'office',
        notes TEXT,${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX IF NOT EXISTS idx_att_employee_date ON attendance(employee_id, date);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS leave_requests (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        leave_type VARCHAR(20) NOT NULL,
        start_date DATE NOT NULL,
        end_date DATE NOT NULL,
        days DOUBLE PRECISION NOT NULL,
        reason TEXT,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        reviewed_by VARCHAR(36) REFERENCES employees(id),
        reviewed_at VARCHAR(32),
        review_note TEXT,${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_leave_employee_start ON leave_requests(employee_id, start_date);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS projects (
        id VARCHAR(36) PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        description TEXT,
        status VARCHAR(20) NOT NULL DEFAULT 'planning',
        start_date DATE,
        end_date DATE,
        budget DOUBLE PRECISION,
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),${AUDIT}
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS project_members (
        id VARCHAR(36) PRIMARY KEY,
        project_id VARCHAR(36) NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        role VARCHAR(50) NOT NULL DEFAULT 'member',
        joined_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_member_project_employee ON project_members(project_id, employee_id);`
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS tasks (
        id VARCHAR(36) PRIMARY KEY,
        title VARCHAR(200) NOT NULL,
        description TEXT,
        project_id VARCHAR(36) NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        assignee_id VARCHAR(36) REFERENCES employees(id),
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),
        status VARCHAR(20) NOT NULL DEFAULT 'todo',
        priority VARCHAR(20) NOT NULL DEFAULT 'medium',
        progress INTEGER NOT NULL DEFAULT 0,
        estimated_hours DOUBLE PRECISION,
        due_date DATE,
        completed_at VARCHAR(32),${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project_id);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS task_comments (
        id VARCHAR(36) PRIMARY KEY,
        task_id VARCHAR(36) NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        comment TEXT NOT NULL,${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_comments_task ON task_comments(task_id);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS salaries (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        base_salary DOUBLE PRECISION NOT NULL,
        salary_type VARCHAR(20) NOT NULL DEFAULT 'fixed',
        frequency VARCHAR(20) NOT NULL DEFAULT 'monthly',
        effective_date DATE NOT NULL,
        end_date DATE,
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_salaries_employee ON salaries(employee_id, effective_date);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payrolls (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        period_start DATE NOT NULL,
        period_end DATE NOT NULL,
        base_salary DOUBLE PRECISION NOT NULL,
        overtime_hours DOUBLE PRECISION NOT NULL DEFAULT 0,
        overtime_amount DOUBLE PRECISION NOT NULL DEFAULT 0,
        bonus DOUBLE PRECISION NOT NULL DEFAULT 0,
        bonus_description TEXT NOT NULL DEFAULT '',
        deductions DOUBLE PRECISION NOT NULL DEFAULT 0,
        deduction_description TEXT NOT NULL DEFAULT '',
        tax DOUBLE PRECISION NOT NULL DEFAULT 0,
        net_amount DOUBLE PRECISION NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'draft',
        payment_date DATE,
        notes TEXT NOT NULL DEFAULT '',
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_payrolls_employee ON payrolls(employee_id, period_end);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS objectives (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(36) NOT NULL REFERENCES employees(id),
        title VARCHAR(200) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        timeframe VARCHAR(20) NOT NULL DEFAULT 'quarterly',
        start_date DATE NOT NULL,
        end_date DATE NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'draft',
        progress INTEGER NOT NULL DEFAULT 0,
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_objectives_employee ON objectives(employee_id);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS key_results (
        id VARCHAR(36) PRIMARY KEY,
        objective_id VARCHAR(36) NOT NULL REFERENCES objectives(id) ON DELETE CASCADE,
        title VARCHAR(200) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        target_value DOUBLE PRECISION NOT NULL,
        current_value DOUBLE PRECISION NOT NULL DEFAULT 0,
        unit VARCHAR(30) NOT NULL DEFAULT '',
        position INTEGER NOT NULL DEFAULT 0,
        progress INTEGER NOT NULL DEFAULT 0,${AUDIT}
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_key_results_objective ON key_results(objective_id);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS client_access (
        id VARCHAR(36) PRIMARY KEY,
        client_id VARCHAR(36) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        project_id VARCHAR(36) NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        can_view_tasks BOOLEAN NOT NULL DEFAULT TRUE,
        can_view_comments BOOLEAN NOT NULL DEFAULT FALSE,
        can_view_team BOOLEAN NOT NULL DEFAULT TRUE,
        created_by VARCHAR(36) NOT NULL REFERENCES employees(id),${AUDIT}
      );
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_client_access_client_project ON client_access(client_id, project_id);`
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of [
      'client_access',
      'key_results',
      'objectives',
      'payrolls',
      'salaries',
      'task_comments',
      'tasks',
      'project_members',
      'projects',
      'leave_requests',
      'attendance',
      'employees',
      'departments',
      'users',
    ]) {
      await queryRunner.query(`DROP TABLE IF EXISTS ${table};`);
    }
  }
}
