// ── Equipment ─────────────────────────────────────────────────────────────

/** Anything with an installation window. A null removal date means still installed. */
export interface EquipmentInterval {
  date_installed: Date;
  date_removed: Date | null;
}

export interface ReceiverInterval extends EquipmentInterval {
  receiver_type: string;
  satellite_system: string;
  serial_number: string;
  firmware_version: string;
  elevation_cutoff: string;
  temperature_stabilization: string;
  notes: string;
}

export interface AntennaInterval extends EquipmentInterval {
  antenna_type: string;
  serial_number: string;
  antenna_reference_point: string;
  /** Marker→ARP eccentricities, metres */
  marker_arp_up_ecc: number;
  marker_arp_north_ecc: number;
  marker_arp_east_ecc: number;
  alignment_from_true_north: string;
  radome_type: string;
  radome_serial_number: string;
  antenna_cable_type: string;
  antenna_cable_length: string;
  notes: string;
}

export type EquipmentKind = 'receiver' | 'antenna';

// ── Header sections ───────────────────────────────────────────────────────

export interface FormInfo {
  prepared_by: string;
  date_prepared: Date | null;
  report_type: string;
}

export interface SiteIdentification {
  site_name: string;
  four_character_id: string;
  nine_character_id: string;
  monument_inscription: string;
  iers_domes_number: string;
  cdp_number: string;
  monument_description: string;
  height_of_monument: string;
  monument_foundation: string;
  foundation_depth: string;
  marker_description: string;
  date_installed: Date | null;
  geologic_characteristic: string;
  bedrock_type: string;
  bedrock_condition: string;
  fracture_spacing: string;
  fault_zones_nearby: string;
  notes: string;
}

export interface SiteLocation {
  city: string;
  state: string;
  country: string;
  tectonic_plate: string;
  x_coordinate: number;
  y_coordinate: number;
  z_coordinate: number;
  latitude_raw: string;
  longitude_raw: string;
  latitude_deg: number | null;
  longitude_deg: number | null;
  elevation: number;
  notes: string;
}

// ── Secondary sections (captured, not used by the STA writer) ─────────────

export interface SurveyedLocalTie {
  tied_marker_name: string;
  tied_marker_usage: string;
  tied_marker_cdp_number: string;
  tied_marker_domes_number: string;
  differential_dx: number;
  differential_dy: number;
  differential_dz: number;
  accuracy_mm: string;
  survey_method: string;
  date_measured: Date | null;
  notes: string;
}

export interface FrequencyStandard {
  standard_type: string;
  input_frequency: string;
  effective_dates: string;
  notes: string;
}

export interface CollocationInformation {
  instrumentation_type: string;
  status: string;
  effective_dates: string;
  notes: string;
}

export type MetSensorType = 'humidity' | 'pressure' | 'temperature' | 'water_vapor';

export interface MeteorologicalSensor {
  sensor_type: MetSensorType;
  model: string;
  manufacturer: string;
  serial_number: string;
  height_diff_to_antenna: string;
  calibration_date: string;
  effective_dates: string;
  data_sampling_interval: string;
  accuracy: string;
  aspiration: string;
  distance_to_antenna: string;
  notes: string;
}

export interface RadioInterference {
  radio_interferences: string;
  observed_degradations: string;
  effective_dates: string;
  notes: string;
}

export interface MultipathSource {
  multipath_sources: string;
  effective_dates: string;
  notes: string;
}

export interface SignalObstruction {
  signal_obstructions: string;
  effective_dates: string;
  notes: string;
}

export interface LocalEpisodicEvent {
  event_date: Date | null;
  event_description: string;
}

export interface ContactInfo {
  agency: string;
  preferred_abbreviation: string;
  mailing_address: string;
  contact_name: string;
  telephone_primary: string;
  telephone_secondary: string;
  fax: string;
  email: string;
  notes: string;
}

export interface MoreInformation {
  primary_data_center: string;
  secondary_data_center: string;
  url_for_more_information: string;
  hardcopy_on_file: string;
  site_map: string;
  site_diagram: string;
  horizon_mask: string;
  monument_description: string;
  site_pictures: string;
  notes: string;
  antenna_graphics: string;
}

// ── Record ────────────────────────────────────────────────────────────────

export interface SiteLogRecord {
  source_file: string;
  form: FormInfo;
  site_identification: SiteIdentification;
  site_location: SiteLocation;
  receivers: ReceiverInterval[];
  antennas: AntennaInterval[];
  surveyed_local_ties: SurveyedLocalTie[];
  frequency_standards: FrequencyStandard[];
  collocation_info: CollocationInformation[];
  humidity_sensors: MeteorologicalSensor[];
  pressure_sensors: MeteorologicalSensor[];
  temperature_sensors: MeteorologicalSensor[];
  water_vapor_sensors: MeteorologicalSensor[];
  radio_interferences: RadioInterference[];
  multipath_sources: MultipathSource[];
  signal_obstructions: SignalObstruction[];
  episodic_events: LocalEpisodicEvent[];
  contact_agency: ContactInfo | null;
  responsible_agency: ContactInfo | null;
  more_information: MoreInformation | null;
  /** Non-fatal findings: repaired dates, dropped equipment, sections that failed to parse */
  warnings: string[];
}
