import React from 'react';
import { DataTable } from '../types';
import { missingColumns } from '../services/dataService';
import StatusBanner from './StatusBanner';

interface RequireColumnsProps {
  table: DataTable;
  columns: string[];
  source: string;
  children: React.ReactNode;
}

// Renders the chart only when the table carries every column it plots
const RequireColumns: React.FC<RequireColumnsProps> = ({ table, columns, source, children }) => {
  const missing = missingColumns(table, columns);
  if (missing.length > 0) {
    return <StatusBanner kind="info" message={`Columns not available in ${source}: ${missing.join(', ')}`} />;
  }
  return <>{children}</>;
};

export default RequireColumns;
