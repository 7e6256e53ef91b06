// ──────────────────────────────────────────
// Shared type definitions for the incentive reports API
// ──────────────────────────────────────────

export type ReportRoleName = 'supervisor' | 'vendor' | 'supernumerary';
export type ProbeStatus = 'connected' | 'error';

export interface Subdomain {
  name: string;
  database: string;
  agentName: string | null;
}

export interface Period {
  id: number;
  start_date: string | null;
  end_date: string | null;
  name: string;
}

/** One joined liquidation record, already coerced to numbers. */
export interface LiquidationRecord {
  variable_id: number;
  variable_name: string;
  period_id: number;
  period_start: string | null;
  user_id: number;
  goal: number;
  results: number;
  rule_points: number;
  liquidation_points: number;
  approved: boolean;
  point_value: number;
}

export interface VariableTotals {
  variable_id: number;
  variable_name: string;
  period_id: number;
  period_start: string | null;
  assigned_goal: number;
  distributed_goal: number;
  assigned_incentive: number;
  distributed_incentive: number;
  total_users: number;
  completed_users: number;
}

export interface ReportRow {
  codigo_agente: string;
  nombre_agente: string;
  periodo_tiempo: string;
  period_id: number;
  variable: string;
  meta_asignada: number;
  meta_distribuida: number;
  porcentaje_meta: number;
  incentivo_asignado: number;
  incentivo_distribuido: number;
  porcentaje_variables_completadas: number;
}

export interface SubdomainFailure {
  subdomain: string;
  error: string;
}

export interface ReportResponse {
  data: ReportRow[];
  total_records: number;
  subdomains_processed: string[];
  subdomains_failed: SubdomainFailure[];
  period_id: number | null;
  generated_at: string;
}

export interface ProbeResult {
  test_query_result: number | null;
  current_time: string | null;
  database_name_actual: string | null;
  mysql_version: string | null;
  table_count: number;
}

export type SubdomainProbe =
  | ({ status: 'connected'; database_name: string } & ProbeResult)
  | { status: 'error'; database_name: string; error: string; error_type: string };

export interface ConnectionSummary {
  connection_success_rate: string;
  all_connected: boolean;
  connection_params: {
    host: string;
    port: number;
    user: string;
    password: string;
  };
}

export interface ConnectionTestResults {
  total_subdomains_configured: number;
  total_subdomains_tested: number;
  successful_connections: number;
  failed_connections: number;
  subdomain_results: Record<string, SubdomainProbe>;
  summary: ConnectionSummary | null;
}

export interface ConnectionTestReport {
  status: 'completed' | 'warning';
  message: string;
  subdomains_file?: string;
  results: ConnectionTestResults;
}
