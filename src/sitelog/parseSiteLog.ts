/**
 * IGS site log parser.
 *
 * One file in, one SiteLogRecord out. Section blocks are read independently:
 * a block that fails to parse is recorded as a warning and the rest of the
 * station's history is kept. Only a missing file is an error.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LOG_PREFIX, errorMessage, ioError, notFound } from '../shared/index.js';
import { FieldReader } from './fields.js';
import { reconcileEquipment } from './reconcile.js';
import { splitSections, type SectionBlock } from './sections.js';
import type {
  AntennaInterval,
  CollocationInformation,
  ContactInfo,
  EquipmentInterval,
  FormInfo,
  FrequencyStandard,
  LocalEpisodicEvent,
  MeteorologicalSensor,
  MetSensorType,
  MoreInformation,
  MultipathSource,
  RadioInterference,
  ReceiverInterval,
  SignalObstruction,
  SiteIdentification,
  SiteLocation,
  SiteLogRecord,
  SurveyedLocalTie,
} from './types.js';

/** Equipment as read from its block, before entries without an install date are dropped. */
export type Draft<T extends EquipmentInterval> = Omit<T, 'date_installed'> & { date_installed: Date | null };

// ── Section readers ───────────────────────────────────────────────────────

export function readForm(r: FieldReader): FormInfo {
  return {
    prepared_by: r.text('Prepared by'),
    date_prepared: r.date('Date Prepared'),
    report_type: r.text('Report Type'),
  };
}

export function readSiteIdentification(r: FieldReader): SiteIdentification {
  return {
    site_name: r.text('Site Name'),
    four_character_id: r.text('Four Character ID'),
    nine_character_id: r.text('Nine Character ID'),
    monument_inscription: r.text('Monument Inscription'),
    iers_domes_number: r.text('IERS DOMES Number'),
    cdp_number: r.text('CDP Number'),
    monument_description: r.text('Monument Description'),
    height_of_monument: r.text('Height of the Monument'),
    monument_foundation: r.text('Monument Foundation'),
    foundation_depth: r.text('Foundation Depth'),
    marker_description: r.text('Marker Description'),
    date_installed: r.date('Date Installed'),
    geologic_characteristic: r.text('Geologic Characteristic'),
    bedrock_type: r.text('Bedrock Type'),
    bedrock_condition: r.text('Bedrock Condition'),
    fracture_spacing: r.text('Fracture Spacing'),
    fault_zones_nearby: r.text('Fault zones nearby'),
    notes: r.multiline('Additional Information'),
  };
}

export function readSiteLocation(r: FieldReader): SiteLocation {
  return {
    city: r.text('City or Town'),
    state: r.text('State or Province'),
    country: r.text('Country'),
    tectonic_plate: r.text('Tectonic Plate'),
    x_coordinate: r.number('X coordinate'),
    y_coordinate: r.number('Y coordinate'),
    z_coordinate: r.number('Z coordinate'),
    latitude_raw: r.text('Latitude'),
    longitude_raw: r.text('Longitude'),
    latitude_deg: r.angle('Latitude'),
    longitude_deg: r.angle('Longitude'),
    elevation: r.number('Elevation'),
    notes: r.multiline('Additional Information'),
  };
}

export function readReceiver(r: FieldReader): Draft<ReceiverInterval> {
  return {
    receiver_type: r.text('Receiver Type'),
    satellite_system: r.text('Satellite System'),
    serial_number: r.text('Serial Number'),
    firmware_version: r.text('Firmware Version'),
    elevation_cutoff: r.text('Elevation Cutoff'),
    date_installed: r.date('Date Installed'),
    date_removed: r.date('Date Removed'),
    temperature_stabilization: r.text('Temperature Stabiliz'),
    notes: r.multiline('Additional Information'),
  };
}

export function readAntenna(r: FieldReader): Draft<AntennaInterval> {
  return {
    antenna_type: r.text('Antenna Type'),
    serial_number: r.text('Serial Number'),
    antenna_reference_point: r.text('Antenna Reference Point'),
    marker_arp_up_ecc: r.number('Marker->ARP Up Ecc'),
    marker_arp_north_ecc: r.number('Marker->ARP North Ecc'),
    marker_arp_east_ecc: r.number('Marker->ARP East Ecc'),
    alignment_from_true_north: r.text('Alignment from True N'),
    radome_type: r.text('Antenna Radome Type'),
    radome_serial_number: r.text('Radome Serial Number'),
    antenna_cable_type: r.text('Antenna Cable Type'),
    antenna_cable_length: r.text('Antenna Cable Length'),
    date_installed: r.date('Date Installed'),
    date_removed: r.date('Date Removed'),
    notes: r.multiline('Additional Information'),
  };
}

export function readSurveyedLocalTie(r: FieldReader): SurveyedLocalTie | null {
  const tie: SurveyedLocalTie = {
    tied_marker_name: r.text('Tied Marker Name'),
    tied_marker_usage: r.text('Tied Marker Usage'),
    tied_marker_cdp_number: r.text('Tied Marker CDP Number'),
    tied_marker_domes_number: r.text('Tied Marker DOMES Number'),
    differential_dx: r.number(String.raw`dx \(m\)`),
    differential_dy: r.number(String.raw`dy \(m\)`),
    differential_dz: r.number(String.raw`dz \(m\)`),
    accuracy_mm: r.text(String.raw`Accuracy \(mm\)`),
    survey_method: r.text('Survey method'),
    date_measured: r.date('Date Measured'),
    notes: r.multiline('Additional Information'),
  };
  return tie.tied_marker_name ? tie : null;
}

export function readFrequencyStandard(r: FieldReader): FrequencyStandard | null {
  const standard: FrequencyStandard = {
    standard_type: r.text('Standard Type'),
    input_frequency: r.text('Input Frequency'),
    effective_dates: r.text('Effective Dates'),
    notes: r.multiline('Notes'),
  };
  return standard.standard_type ? standard : null;
}

export function readCollocation(r: FieldReader): CollocationInformation | null {
  const collocation: CollocationInformation = {
    instrumentation_type: r.text('Instrumentation Type'),
    status: r.text('Status'),
    effective_dates: r.text('Effective Dates'),
    notes: r.multiline('Notes'),
  };
  return collocation.instrumentation_type ? collocation : null;
}

const MET_SENSOR_MODEL_LABELS: Record<MetSensorType, string> = {
  humidity: 'Humidity Sensor Model',
  pressure: 'Pressure Sensor Model',
  temperature: String.raw`Temp\. Sensor Model`,
  water_vapor: 'Water Vapor Radiometer',
};

export function readMetSensor(r: FieldReader, sensorType: MetSensorType): MeteorologicalSensor | null {
  const sensor: MeteorologicalSensor = {
    sensor_type: sensorType,
    model: r.text(MET_SENSOR_MODEL_LABELS[sensorType]),
    manufacturer: r.text('Manufacturer'),
    serial_number: r.text('Serial Number'),
    height_diff_to_antenna: r.text('Height Diff to Ant'),
    calibration_date: r.text('Calibration date'),
    effective_dates: r.text('Effective Dates'),
    data_sampling_interval: r.text('Data Sampling Interval'),
    accuracy: r.text('Accuracy'),
    aspiration: r.text('Aspiration'),
    distance_to_antenna: r.text('Distance to Antenna'),
    notes: r.multiline('Notes'),
  };
  return sensor.model ? sensor : null;
}

export function readRadioInterference(r: FieldReader): RadioInterference | null {
  const interference: RadioInterference = {
    radio_interferences: r.text('Radio Interferences'),
    // the form has carried both spellings
    observed_degradations: r.text('Observed Degr[ae]dations'),
    effective_dates: r.text('Effective Dates'),
    notes: r.multiline('Additional Information'),
  };
  return interference.radio_interferences ? interference : null;
}

export function readMultipathSource(r: FieldReader): MultipathSource | null {
  const source: MultipathSource = {
    multipath_sources: r.text('Multipath Sources'),
    effective_dates: r.text('Effective Dates'),
    notes: r.multiline('Additional Information'),
  };
  return source.multipath_sources ? source : null;
}

export function readSignalObstruction(r: FieldReader): SignalObstruction | null {
  const obstruction: SignalObstruction = {
    signal_obstructions: r.text('Signal Obstructions'),
    effective_dates: r.text('Effective Dates'),
    notes: r.multiline('Additional Information'),
  };
  return obstruction.signal_obstructions ? obstruction : null;
}

export function readEpisodicEvent(r: FieldReader): LocalEpisodicEvent | null {
  const event: LocalEpisodicEvent = {
    event_date: r.date('Date'),
    event_description: r.multiline('Event'),
  };
  return event.event_description || event.event_date ? event : null;
}

export function readContact(r: FieldReader): ContactInfo | null {
  const contact: ContactInfo = {
    agency: r.multiline('Agency'),
    preferred_abbreviation: r.text('Preferred Abbreviation'),
    mailing_address: r.multiline('Mailing Address'),
    contact_name: r.text('Contact Name'),
    telephone_primary: r.text(String.raw`Telephone \(primary\)`),
    telephone_secondary: r.text(String.raw`Telephone \(secondary\)`),
    fax: r.text('Fax'),
    email: r.text('E-mail'),
    notes: r.multiline('Additional Information'),
  };
  return Object.values(contact).some(value => value.length > 0) ? contact : null;
}

export function readMoreInformation(r: FieldReader): MoreInformation {
  return {
    primary_data_center: r.text('Primary Data Center'),
    secondary_data_center: r.text('Secondary Data Center'),
    url_for_more_information: r.text('URL for More Information'),
    hardcopy_on_file: r.text('Hardcopy on File'),
    site_map: r.text('Site Map'),
    site_diagram: r.text('Site Diagram'),
    horizon_mask: r.text('Horizon Mask'),
    monument_description: r.text('Monument Description'),
    site_pictures: r.text('Site Pictures'),
    notes: r.multiline('Additional Information'),
    antenna_graphics: r.multiline('Antenna Graphics with Dimensions'),
  };
}

// ── Record assembly ───────────────────────────────────────────────────────

function emptyForm(): FormInfo {
  return { prepared_by: '', date_prepared: null, report_type: '' };
}

function emptySiteIdentification(): SiteIdentification {
  return readSiteIdentification(new FieldReader([]));
}

function emptySiteLocation(): SiteLocation {
  return readSiteLocation(new FieldReader([]));
}

interface RecordBuilder {
  form: FormInfo;
  site_identification: SiteIdentification;
  site_location: SiteLocation;
  receivers: Draft<ReceiverInterval>[];
  antennas: Draft<AntennaInterval>[];
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
  warnings: string[];
}

function pushIf<T>(list: T[], value: T | null): void {
  if (value !== null) list.push(value);
}

function isBlankEquipment(draft: { date_installed: Date | null }, type: string, serial: string): boolean {
  return draft.date_installed === null && type.length === 0 && serial.length === 0;
}

/**
 * Sections 10, 11 and 12 changed meaning between generations of the form
 * (multipath → episodic effects, signal obstructions → on-site contact,
 * episodic events → responsible agency). The reading suggested by the header
 * shape is tried first; if it finds nothing the other reading is tried.
 */
function applyAmbiguousBlock(b: RecordBuilder, block: SectionBlock, r: FieldReader): void {
  const numbered = block.index !== null;

  if (block.kind === 'multipath_or_episodic') {
    const multipath = readMultipathSource(r);
    if (multipath) b.multipath_sources.push(multipath);
    else pushIf(b.episodic_events, readEpisodicEvent(r));
    return;
  }

  if (block.kind === 'obstruction_or_contact') {
    const obstruction = readSignalObstruction(r);
    const contact = readContact(r);
    if (obstruction && (numbered || !contact)) {
      b.signal_obstructions.push(obstruction);
    } else if (contact) {
      b.contact_agency = contact;
    }
    return;
  }

  if (block.kind === 'episodic_or_responsible') {
    const event = readEpisodicEvent(r);
    const agency = readContact(r);
    if (event && (numbered || !agency)) {
      b.episodic_events.push(event);
    } else if (agency) {
      b.responsible_agency = agency;
    }
  }
}

function applyBlock(b: RecordBuilder, block: SectionBlock): void {
  const r = new FieldReader(block.lines);

  switch (block.kind) {
    case 'form':
      b.form = readForm(r);
      return;
    case 'site_identification':
      b.site_identification = readSiteIdentification(r);
      return;
    case 'site_location':
      b.site_location = readSiteLocation(r);
      return;
    case 'receiver': {
      const receiver = readReceiver(r);
      if (!isBlankEquipment(receiver, receiver.receiver_type, receiver.serial_number)) b.receivers.push(receiver);
      return;
    }
    case 'antenna': {
      const antenna = readAntenna(r);
      if (!isBlankEquipment(antenna, antenna.antenna_type, antenna.serial_number)) b.antennas.push(antenna);
      return;
    }
    case 'surveyed_local_tie':
      pushIf(b.surveyed_local_ties, readSurveyedLocalTie(r));
      return;
    case 'frequency_standard':
      pushIf(b.frequency_standards, readFrequencyStandard(r));
      return;
    case 'collocation':
      pushIf(b.collocation_info, readCollocation(r));
      return;
    case 'humidity_sensor':
      pushIf(b.humidity_sensors, readMetSensor(r, 'humidity'));
      return;
    case 'pressure_sensor':
      pushIf(b.pressure_sensors, readMetSensor(r, 'pressure'));
      return;
    case 'temperature_sensor':
      pushIf(b.temperature_sensors, readMetSensor(r, 'temperature'));
      return;
    case 'water_vapor_sensor':
      pushIf(b.water_vapor_sensors, readMetSensor(r, 'water_vapor'));
      return;
    case 'radio_interference':
      pushIf(b.radio_interferences, readRadioInterference(r));
      return;
    case 'multipath_source':
      pushIf(b.multipath_sources, readMultipathSource(r));
      return;
    case 'signal_obstruction':
      pushIf(b.signal_obstructions, readSignalObstruction(r));
      return;
    case 'more_information':
      b.more_information = readMoreInformation(r);
      return;
    case 'multipath_or_episodic':
    case 'obstruction_or_contact':
    case 'episodic_or_responsible':
      applyAmbiguousBlock(b, block, r);
      return;
  }
}

// ── Post-processing ───────────────────────────────────────────────────────

/** Prefer the 4-character ID; fall back to the first four of the 9-character ID. */
export function resolveStationIdentification(si: SiteIdentification): SiteIdentification {
  if (si.four_character_id.length === 4) return si;
  if (si.nine_character_id.length >= 4) {
    return { ...si, four_character_id: si.nine_character_id.slice(0, 4).toUpperCase() };
  }
  if (si.four_character_id) {
    return { ...si, four_character_id: si.four_character_id.trim().toUpperCase().slice(0, 4) };
  }
  return si;
}

function hasInstallDate<T extends EquipmentInterval>(draft: Draft<T>): draft is Draft<T> & { date_installed: Date } {
  return draft.date_installed !== null;
}

function dropUndated<T extends EquipmentInterval>(
  drafts: readonly Draft<T>[],
  describe: (draft: Draft<T>) => string,
  label: string,
  warnings: string[],
): Array<Draft<T> & { date_installed: Date }> {
  const kept: Array<Draft<T> & { date_installed: Date }> = [];
  for (const draft of drafts) {
    if (hasInstallDate(draft)) kept.push(draft);
    else warnings.push(`${label} without date_installed: ${describe(draft)}`);
  }
  return kept;
}

export function parseSiteLogContent(content: string, sourceFile = ''): SiteLogRecord {
  const b: RecordBuilder = {
    form: emptyForm(),
    site_identification: emptySiteIdentification(),
    site_location: emptySiteLocation(),
    receivers: [],
    antennas: [],
    surveyed_local_ties: [],
    frequency_standards: [],
    collocation_info: [],
    humidity_sensors: [],
    pressure_sensors: [],
    temperature_sensors: [],
    water_vapor_sensors: [],
    radio_interferences: [],
    multipath_sources: [],
    signal_obstructions: [],
    episodic_events: [],
    contact_agency: null,
    responsible_agency: null,
    more_information: null,
    warnings: [],
  };

  for (const block of splitSections(content)) {
    if (block.template) continue;
    try {
      applyBlock(b, block);
    } catch (err) {
      b.warnings.push(`Section "${block.header}" could not be parsed: ${errorMessage(err)}`);
    }
  }

  const warnings = [...b.warnings];
  const receivers = reconcileEquipment<ReceiverInterval>(
    dropUndated<ReceiverInterval>(b.receivers, d => d.receiver_type, 'Receiver', warnings),
    'receiver',
  );
  const antennas = reconcileEquipment<AntennaInterval>(
    dropUndated<AntennaInterval>(b.antennas, d => d.antenna_type, 'Antenna', warnings),
    'antenna',
  );
  warnings.push(...receivers.warnings, ...antennas.warnings);

  return {
    source_file: sourceFile,
    form: b.form,
    site_identification: resolveStationIdentification(b.site_identification),
    site_location: b.site_location,
    receivers: receivers.items,
    antennas: antennas.items,
    surveyed_local_ties: b.surveyed_local_ties,
    frequency_standards: b.frequency_standards,
    collocation_info: b.collocation_info,
    humidity_sensors: b.humidity_sensors,
    pressure_sensors: b.pressure_sensors,
    temperature_sensors: b.temperature_sensors,
    water_vapor_sensors: b.water_vapor_sensors,
    radio_interferences: b.radio_interferences,
    multipath_sources: b.multipath_sources,
    signal_obstructions: b.signal_obstructions,
    episodic_events: b.episodic_events,
    contact_agency: b.contact_agency,
    responsible_agency: b.responsible_agency,
    more_information: b.more_information,
    warnings,
  };
}

// ── Record helpers ────────────────────────────────────────────────────────

export function stationId(record: SiteLogRecord): string {
  const si = record.site_identification;
  if (si.four_character_id) return si.four_character_id.toUpperCase().slice(0, 4);
  if (si.nine_character_id) return si.nine_character_id.toUpperCase().slice(0, 4);
  return '';
}

function latestInstalled<T extends EquipmentInterval>(items: readonly T[]): T | null {
  const open = items.filter(item => item.date_removed === null);
  const pool = open.length > 0 ? open : items;
  let latest: T | null = null;
  for (const item of pool) {
    if (latest === null || item.date_installed.getTime() > latest.date_installed.getTime()) latest = item;
  }
  return latest;
}

/** Still-installed receiver, or the most recently installed one. */
export function currentReceiver(record: SiteLogRecord): ReceiverInterval | null {
  return latestInstalled(record.receivers);
}

export function currentAntenna(record: SiteLogRecord): AntennaInterval | null {
  return latestInstalled(record.antennas);
}

// ── Files ─────────────────────────────────────────────────────────────────

/** UTF-8 when the bytes are valid UTF-8, Latin-1 otherwise. */
export function decodeSiteLogBytes(bytes: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

export function parseSiteLogFile(filePath: string): SiteLogRecord {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw notFound(`Site log file not found: ${resolved}`, { path: resolved });
  }
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (err) {
    throw ioError(`Cannot read site log ${resolved}: ${errorMessage(err)}`, { path: resolved });
  }
  return parseSiteLogContent(decodeSiteLogBytes(bytes), resolved);
}

export interface DirectoryParseFailure {
  file: string;
  error: string;
}

export interface DirectoryParseResult {
  directory: string;
  /** Keyed by lower-case station ID */
  records: Map<string, SiteLogRecord>;
  failures: DirectoryParseFailure[];
  /** Files that parsed but yielded no station ID */
  skipped: string[];
}

export interface DirectoryParseOptions {
  /** Station IDs to keep (case-insensitive); all stations when omitted */
  stations?: readonly string[];
}

function preparedAt(record: SiteLogRecord): number {
  return record.form.date_prepared?.getTime() ?? Number.NEGATIVE_INFINITY;
}

/**
 * Parses every *.log file in a directory. Two logs for the same station:
 * the one with the later "Date Prepared" wins. A file that cannot be read or
 * parsed is recorded as a failure and the batch carries on.
 */
export function parseSiteLogDirectory(
  directory: string,
  options: DirectoryParseOptions = {},
): DirectoryParseResult {
  const resolved = path.resolve(directory);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw notFound(`Site log directory not found: ${resolved}`, { path: resolved });
  }

  const filter = options.stations && options.stations.length > 0
    ? new Set(options.stations.map(s => s.trim().toLowerCase()))
    : null;

  const result: DirectoryParseResult = {
    directory: resolved,
    records: new Map(),
    failures: [],
    skipped: [],
  };

  const files = fs.readdirSync(resolved)
    .filter(name => name.toLowerCase().endsWith('.log'))
    .sort();

  for (const name of files) {
    const filePath = path.join(resolved, name);
    let record: SiteLogRecord;
    try {
      record = parseSiteLogFile(filePath);
    } catch (err) {
      const message = errorMessage(err);
      console.error(`${LOG_PREFIX} Failed to parse ${filePath}: ${message}`);
      result.failures.push({ file: filePath, error: message });
      continue;
    }

    const key = stationId(record).toLowerCase();
    if (!key) {
      result.skipped.push(filePath);
      continue;
    }
    if (filter && !filter.has(key)) continue;

    const existing = result.records.get(key);
    if (!existing || preparedAt(record) > preparedAt(existing)) {
      result.records.set(key, record);
    }
  }

  return result;
}
