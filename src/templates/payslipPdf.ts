import PDFDocument from 'pdfkit';
import type { Payslip } from '../services/payslip';

const MARGIN = 40;

const money = (n: number) =>
  n.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** Renders a payslip to an A4 PDF held in memory. */
export function renderPayslipPdf(payslip: Payslip, companyName: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: MARGIN, size: 'A4' });
    const chunks: Buffer[] = [];
    doc.on('data', (c: Buffer) => chunks.push(c));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const pageWidth = doc.page.width;
    const pageHeight = doc.page.height;
    const contentWidth = pageWidth - MARGIN * 2;
    let y = MARGIN;

    if (payslip.options.includeCompanyLogo) {
      doc.save();
      doc.lineWidth(2).circle(MARGIN + 24, y + 24, 24).stroke('#2dd4bf');
      doc.restore();
      doc
        .fontSize(18)
        .fillColor('#0f172a')
        .text(companyName.charAt(0).toUpperCase(), MARGIN + 8, y + 14, { width: 32, align: 'center' });
    }

    const headerX = MARGIN + 64;
    doc.fillColor('#0f172a').fontSize(20).font('Helvetica-Bold').text(companyName, headerX, y);
    doc.fontSize(10).fillColor('#334155').font('Helvetica').text('PAYSLIP', headerX, y + 26);
    doc.moveTo(MARGIN, y + 56).lineTo(pageWidth - MARGIN, y + 56).lineWidth(0.5).strokeColor('#e6e9ee').stroke();
    y += 70;

    doc
      .fontSize(12)
      .fillColor('#059669')
      .font('Helvetica-Bold')
      .text(`Pay period ${payslip.payroll.period}`, MARGIN, y, { width: contentWidth, align: 'center' });
    y = doc.y + 12;

    const colW = (contentWidth - 12) / 2;
    const rightX = MARGIN + colW + 12;
    const field = (label: string, value: string, x: number, top: number) => {
      doc.fontSize(9).fillColor('#64748b').font('Helvetica').text(label, x, top);
      doc.fontSize(11).fillColor('#0f172a').font('Helvetica-Bold').text(value, x, top + 12, { width: colW });
    };

    field('Employee Name', payslip.employee.name, MARGIN, y);
    field('Employee Code', payslip.employee.code, rightX, y);
    y += 34;
    field('Department', payslip.employee.department, MARGIN, y);
    field('Position', payslip.employee.position ?? 'N/A', rightX, y);
    y += 34;
    field('Status', payslip.payroll.status, MARGIN, y);
    field('Payment Date', payslip.payroll.paymentDate ?? 'Pending', rightX, y);
    y += 44;

    const p = payslip.payroll;
    if (payslip.options.includeBreakdown) {
      const midX = MARGIN + contentWidth / 2;
      doc.fontSize(11).fillColor('#334155').font('Helvetica-Bold').text('Earnings', MARGIN + 10, y);
      doc.text('Deductions', midX + 10, y);
      y += 22;

      const earnings: [string, number][] = [
        ['Base Salary', p.baseSalary],
        [`Overtime (${p.overtimeHours} h)`, p.overtimeAmount],
        [p.bonusDescription ? `Bonus: ${p.bonusDescription}` : 'Bonus', p.bonus],
      ];
      const deductions: [string, number][] = [
        [p.deductionDescription ? `Deductions: ${p.deductionDescription}` : 'Deductions', p.deductions],
        ['Tax', p.tax],
      ];
      const halfW = contentWidth / 2 - 20;
      for (let i = 0; i < Math.max(earnings.length, deductions.length); i++) {
        const left = earnings[i];
        const right = deductions[i];
        if (left) {
          doc.fontSize(10).fillColor('#0f172a').font('Helvetica').text(left[0], MARGIN + 10, y);
          doc.font('Helvetica-Bold').text(money(left[1]), MARGIN + 10, y, { width: halfW, align: 'right' });
        }
        if (right) {
          doc.fontSize(10).fillColor('#0f172a').font('Helvetica').text(right[0], midX + 10, y);
          doc.font('Helvetica-Bold').text(money(right[1]), midX + 10, y, { width: halfW, align: 'right' });
        }
        y += 16;
      }
      doc.moveTo(MARGIN, y + 4).lineTo(MARGIN + contentWidth, y + 4).lineWidth(0.5).strokeColor('#e6e9ee').stroke();
      y += 30;
    }

    doc.rect(MARGIN, y, contentWidth, 48).fillAndStroke('#ecfdf5', '#d1fae5');
    doc.fillColor('#065f46').font('Helvetica-Bold').fontSize(12).text('Net Pay', MARGIN + 12, y + 16);
    doc.fontSize(18).text(money(p.netAmount), MARGIN, y + 12, { width: contentWidth - 12, align: 'right' });
    y += 70;

    if (payslip.options.includeSignature) {
      doc.moveTo(pageWidth - MARGIN - 160, y + 40).lineTo(pageWidth - MARGIN, y + 40).strokeColor('#94a3b8').stroke();
      doc.fontSize(9).fillColor('#64748b').font('Helvetica').text('Authorised signatory', pageWidth - MARGIN - 160, y + 46);
    }

    doc
      .fontSize(9)
      .fillColor('#94a3b8')
      .font('Helvetica')
      .text(
        `Generated ${payslip.generationDate}. This is a system-generated payslip and does not require a signature.`,
        MARGIN,
        pageHeight - MARGIN - 30,
        { align: 'center', width: contentWidth }
      );

    doc.end();
  });
}
