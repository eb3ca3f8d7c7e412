import { Department, Employee, Payroll } from '../entities';
import { nowIso } from '../utils/dates';

export type PayslipOptions = {
  includeBreakdown: boolean;
  includeCompanyLogo: boolean;
  includeSignature: boolean;
};

export type Payslip = {
  employee: { name: string; code: string; position: string | null; department: string };
  payroll: {
    id: string;
    period: string;
    periodStart: string;
    periodEnd: string;
    status: Payroll['status'];
    paymentDate: string | null;
    baseSalary: number;
    overtimeHours: number;
    overtimeAmount: number;
    bonus: number;
    bonusDescription: string;
    deductions: number;
    deductionDescription: string;
    tax: number;
    netAmount: number;
  };
  options: PayslipOptions;
  generationDate: string;
};

export const DEFAULT_PAYSLIP_OPTIONS: PayslipOptions = {
  includeBreakdown: true,
  includeCompanyLogo: true,
  includeSignature: false,
};

export function buildPayslip(
  payroll: Payroll,
  employee: Employee,
  department: Department | null,
  options: PayslipOptions = DEFAULT_PAYSLIP_OPTIONS
): Payslip {
  return {
    employee: {
      name: `${employee.firstName} ${employee.lastName}`,
      code: employee.employeeCode,
      position: employee.position,
      department: department?.name ?? 'N/A',
    },
    payroll: {
      id: payroll.id,
      period: `${payroll.periodStart} to ${payroll.periodEnd}`,
      periodStart: payroll.periodStart,
      periodEnd: payroll.periodEnd,
      status: payroll.status,
      paymentDate: payroll.paymentDate,
      baseSalary: payroll.baseSalary,
      overtimeHours: payroll.overtimeHours,
      overtimeAmount: payroll.overtimeAmount,
      bonus: payroll.bonus,
      bonusDescription: payroll.bonusDescription,
      deductions: payroll.deductions,
      deductionDescription: payroll.deductionDescription,
      tax: payroll.tax,
      netAmount: payroll.netAmount,
    },
    options,
    generationDate: nowIso(),
  };
}
