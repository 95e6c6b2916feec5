// src/refinement-session.ts — Refinement Session
// Pull-based dialogue over one analysis run: nextQuestion() hands out a single
// question, answer() applies the reply to records and hypotheses.
// An answer to a blocking (HIGH/MEDIUM) question must shrink the number of open
// blocking questions; if it does not, the session stalls instead of looping.

import type {
  Answer,
  AnswerOutcome,
  ComponentCatalog,
  ComponentDescriptor,
  ComponentHypothesis,
  DiscoveryBackend,
  ImpactRecord,
  OpenQuestion,
  Ontology,
  ResolutionEntry,
  ResolvedConfig,
  ScoreResult,
  SessionSnapshot,
  SessionState,
  Warning,
} from "./types.js";
import { isPlaceholder, probableChanges, resolve } from "./component-resolver.js";
import { detectOwnershipTie, impactFor } from "./domain-scorer.js";
import { CatalogDiscovery } from "./discovery-search.js";
import { componentFilter, findDomain, UNKNOWN_DOMAIN } from "./ontology-store.js";
import {
  confirmImpactQuestion,
  eventSchemaQuestion,
  isBlocking,
  PRIORITY_ORDER,
  rephraseQuestion,
} from "./questions.js";

export interface SessionInput {
  request: string;
  ontology: Ontology;
  /** Catalog snapshot taken when the analysis started. */
  catalog: ComponentCatalog;
  scored: ScoreResult;
  config: Pick<ResolvedConfig, "exclude" | "discovery">;
  /** Defaults to searching `catalog`. */
  discovery?: DiscoveryBackend;
  /** This run's warnings; UnknownCatalogReference entries land here. */
  warnings?: Warning[];
}

type Applied = { ok: true; spawned: string[] } | { ok: false; reason: string };

const OK: Applied = { ok: true, spawned: [] };

export class RefinementSession {
  readonly request: string;
  readonly ontologyVersion: string;

  private readonly ontology: Ontology;
  private readonly catalog: ComponentCatalog;
  private readonly warnings: Warning[];
  /** Speculative components named in answers; never written to the shared catalog. */
  private readonly overlay = new Map<string, ComponentDescriptor>();
  /** Insertion order is creation order. */
  private readonly questions = new Map<string, OpenQuestion>();

  private records: ImpactRecord[];
  private hypotheses: ComponentHypothesis[] = [];
  private resolutions: ResolutionEntry[] = [];
  private current: SessionState = "open";
  private dispatched: string | undefined;
  private stall: { questionId: string; reason: string } | undefined;

  constructor(input: SessionInput) {
    this.request = input.request;
    this.ontology = input.ontology;
    this.ontologyVersion = input.ontology.version;
    this.catalog = input.catalog;
    this.warnings = input.warnings ?? [];
    this.records = input.scored.records.map(cloneRecord);

    if (this.records.length === 0) {
      this.register(rephraseQuestion());
    }

    const tieQuestion = detectOwnershipTie(input.scored);
    const options = {
      isExcluded: componentFilter(input.config.exclude),
      tieQuestion: tieQuestion ? this.register(tieQuestion) : undefined,
      discovery: input.discovery ?? new CatalogDiscovery(input.catalog),
      maxSuggestions: input.config.discovery.maxSuggestions,
    };
    for (const record of this.records) {
      for (const hypothesis of resolve(record, this.catalog, this.ontology, options)) {
        hypothesis.openQuestions = hypothesis.openQuestions.map((q) => this.register(q));
        this.hypotheses.push(hypothesis);
      }
    }

    this.current = this.settledState();
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * The single question the caller should answer next. Repeats the dispatched
   * question until it is answered; undefined once resolved, stalled or cancelled.
   */
  nextQuestion(): OpenQuestion | undefined {
    if (this.current === "resolved" || this.current === "stalled" || this.current === "cancelled") {
      return undefined;
    }
    if (this.dispatched) {
      const pending = this.questions.get(this.dispatched);
      if (pending?.state === "open") return pending;
    }
    const next = this.openQuestions()[0];
    if (!next) return undefined;
    this.dispatched = next.id;
    this.current = "awaiting-answer";
    return next;
  }

  /** Open questions, highest priority first, then by creation. */
  openQuestions(): OpenQuestion[] {
    return [...this.questions.values()]
      .filter((q) => q.state === "open")
      .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
  }

  answer(id: string, answer: Answer): AnswerOutcome {
    if (this.current === "cancelled") return this.refuse("session is cancelled");
    const question = this.questions.get(id);
    if (!question) return this.refuse(`unknown question "${id}"`);
    if (question.state === "answered") return this.refuse(`question "${id}" is already answered`);
    if (answer.kind === "override") return this.override(id);

    const before = this.blockingCount();
    const wasBlocking = isBlocking(question);

    const applied = answer.kind === "unsure" ? OK : this.apply(question, answer);
    if (!applied.ok) return this.refuse(applied.reason);

    this.resolutions.push({ questionId: id, answer });
    if (answer.kind !== "unsure") {
      question.state = "answered";
      question.answer = answer;
    }

    const after = this.blockingCount();
    if (after > before || (wasBlocking && after >= before)) {
      this.dispatched = undefined;
      this.stall = {
        questionId: id,
        reason: answer.kind === "unsure"
          ? `question "${id}" is still unresolved`
          : `answer to "${id}" left ${after} blocking question(s) open`,
      };
      this.current = "stalled";
    } else {
      this.stall = undefined;
      this.current = this.settledState();
    }

    return { accepted: true, state: this.current, spawned: applied.spawned };
  }

  /**
   * Close a question without applying an answer. Manual escape from a stall;
   * the affected records keep their confidence, note the override and, unless
   * already confirmed or rejected, are marked "overridden".
   */
  override(id: string): AnswerOutcome {
    if (this.current === "cancelled") return this.refuse("session is cancelled");
    const question = this.questions.get(id);
    if (!question) return this.refuse(`unknown question "${id}"`);
    if (question.state === "answered") return this.refuse(`question "${id}" is already answered`);

    question.state = "answered";
    question.answer = { kind: "override" };
    this.resolutions.push({ questionId: id, answer: { kind: "override" } });
    for (const domain of question.subject.domains) {
      const record = this.record(domain);
      if (!record) continue;
      record.reasoning.push(`question "${id}" closed by manual override`);
      if (record.status === "proposed") record.status = "overridden";
    }
    const hypothesis = this.hypothesisAsking(question);
    if (hypothesis?.status === "proposed") hypothesis.status = "overridden";

    this.stall = undefined;
    this.current = this.settledState();
    return { accepted: true, state: this.current, spawned: [] };
  }

  /** Abandon the session. Its state is discarded; later calls are refused. */
  cancel(): void {
    this.current = "cancelled";
    this.dispatched = undefined;
    this.stall = undefined;
    this.records = [];
    this.hypotheses = [];
    this.resolutions = [];
    this.questions.clear();
    this.overlay.clear();
  }

  /** Catalog entry for a component, including speculative ones from answers. */
  describe(component: string): ComponentDescriptor | undefined {
    return this.catalog.byName.get(component) ?? this.overlay.get(component);
  }

  /** Plain copy of the session state, safe to serialize or keep. */
  snapshot(): SessionSnapshot {
    return {
      request: this.request,
      ontologyVersion: this.ontologyVersion,
      state: this.current,
      records: this.records.map(cloneRecord),
      hypotheses: this.hypotheses.map(cloneHypothesis),
      questions: [...this.questions.values()].map(cloneQuestion),
      resolutions: this.resolutions.map((r) => ({ questionId: r.questionId, answer: { ...r.answer } })),
      speculativeComponents: [...this.overlay.values()].map((c) => ({ ...c })),
      ...(this.stall ? { stall: { ...this.stall } } : {}),
      warnings: this.warnings.map((w) => ({ ...w })),
    };
  }

  // ─── Answer handlers ─────────────────────────────────────────────────────────

  private apply(question: OpenQuestion, answer: Answer): Applied {
    switch (question.topic) {
      case "ownership-tie":
        return this.applyTie(question, answer);
      case "confirm-impact":
        return this.applyConfirm(question, answer);
      case "component-owner":
        return this.applyOwner(question, answer);
      case "event-schema":
        return this.applyEventSchema(question, answer);
      case "rephrase":
        return { ok: false, reason: "rephrase the request and start a new analysis" };
    }
  }

  private applyTie(question: OpenQuestion, answer: Answer): Applied {
    if (answer.kind !== "choose" || !question.options.includes(answer.option)) {
      return { ok: false, reason: `choose one of: ${question.options.join(", ")}` };
    }

    const chosen = answer.option;
    const spawned: string[] = [];
    for (const domain of question.subject.domains) {
      const record = this.record(domain);
      if (!record) continue;
      delete record.tiedWith;

      if (domain === chosen) {
        record.status = "confirmed";
        record.reasoning.push(`chosen as owner by answer to "${question.id}"`);
        continue;
      }

      record.confidence = "low";
      record.impactType = "dependency";
      record.reasoning.push(`ownership assigned to ${chosen} by answer to "${question.id}"; now a dependency`);
      for (const hypothesis of this.hypothesesOf(domain)) {
        hypothesis.changeKind = "dependency";
        hypothesis.probableChanges = probableChanges(record, "dependency", this.describe(hypothesis.component));
        // Placeholders keep their owner question; catalog components need a fresh confirmation
        if (hypothesis.speculative) continue;
        const followUp = this.register(confirmImpactQuestion(hypothesis.component, domain, "low"));
        hypothesis.openQuestions.push(followUp);
        spawned.push(followUp.id);
      }
    }
    return { ok: true, spawned };
  }

  private applyConfirm(question: OpenQuestion, answer: Answer): Applied {
    const hypothesis = this.hypothesisAsking(question);
    const record = hypothesis ? this.record(hypothesis.domain) : undefined;
    if (!hypothesis || !record) return { ok: false, reason: `question "${question.id}" no longer applies` };

    switch (answer.kind) {
      case "confirm":
        return this.confirm(record, hypothesis, question);
      case "add-change": {
        if (answer.description.trim() === "") return { ok: false, reason: "change description is empty" };
        const result = this.confirm(record, hypothesis, question);
        hypothesis.probableChanges.push(answer.description.trim());
        return result;
      }
      case "reject":
        this.reject(record, hypothesis, question);
        return OK;
      case "choose":
        return this.bind(record, hypothesis, answer.option, question);
      case "reassign":
        return this.bind(record, hypothesis, answer.component, question);
      default:
        return { ok: false, reason: `"${answer.kind}" does not answer a confirmation question` };
    }
  }

  private applyOwner(question: OpenQuestion, answer: Answer): Applied {
    const placeholder = this.hypothesisAsking(question);
    const record = placeholder ? this.record(placeholder.domain) : undefined;
    if (!placeholder || !record) return { ok: false, reason: `question "${question.id}" no longer applies` };

    switch (answer.kind) {
      case "choose":
        return this.bind(record, placeholder, answer.option, question);
      case "reassign":
        return this.bind(record, placeholder, answer.component, question);
      case "reject":
        this.reject(record, placeholder, question);
        return OK;
      default:
        return { ok: false, reason: "name the owning component, or reject the domain" };
    }
  }

  private applyEventSchema(question: OpenQuestion, answer: Answer): Applied {
    const hypothesis = this.hypothesisAsking(question);
    if (!hypothesis) return { ok: false, reason: `question "${question.id}" no longer applies` };

    switch (answer.kind) {
      case "choose":
        if (answer.option.trim() === "") return { ok: false, reason: "event name is empty" };
        hypothesis.probableChanges.push(`Publish ${answer.option.trim()} event`);
        return OK;
      case "add-change":
        if (answer.description.trim() === "") return { ok: false, reason: "change description is empty" };
        hypothesis.probableChanges.push(answer.description.trim());
        return OK;
      case "confirm":
      case "reject":
        return OK;
      default:
        return { ok: false, reason: `"${answer.kind}" does not answer an event-schema question` };
    }
  }

  // ─── State changes ───────────────────────────────────────────────────────────

  private confirm(record: ImpactRecord, hypothesis: ComponentHypothesis, question: OpenQuestion): Applied {
    hypothesis.status = "confirmed";
    this.escalate(record, question);
    if (hypothesis.changeKind !== record.impactType) {
      hypothesis.changeKind = record.impactType;
      hypothesis.probableChanges = probableChanges(record, record.impactType, this.describe(hypothesis.component));
    }

    const descriptor = this.describe(hypothesis.component);
    if (descriptor?.type !== "integration" && hypothesis.changeKind !== "side-effect") return OK;

    const followUp = eventSchemaQuestion(hypothesis.component, hypothesis.domain, [...(descriptor?.publishes ?? [])]);
    if (this.questions.has(followUp.id)) return OK;
    hypothesis.openQuestions.push(this.register(followUp));
    return { ok: true, spawned: [followUp.id] };
  }

  private reject(record: ImpactRecord, hypothesis: ComponentHypothesis, question: OpenQuestion): void {
    hypothesis.status = "rejected";
    if (this.hypothesesOf(record.domain).every((h) => h.status === "rejected")) {
      record.status = "rejected";
      record.reasoning.push(`rejected by answer to "${question.id}"`);
    }
  }

  /**
   * Replace `replaced` with the named component. Unknown names become
   * speculative session-local catalog entries with domain "unknown".
   */
  private bind(
    record: ImpactRecord,
    replaced: ComponentHypothesis,
    name: string,
    question: OpenQuestion,
  ): Applied {
    const component = name.trim();
    if (component === "") return { ok: false, reason: "component name is empty" };
    if (component === replaced.component) {
      return { ok: false, reason: `${component} is the component in question; confirm it instead` };
    }

    const descriptor = this.describe(component) ?? this.registerSpeculative(component, question.id);
    this.escalate(record, question);

    const speculative = descriptor.speculative === true;
    if (!speculative && descriptor.domain !== record.domain) {
      this.warnings.push({
        level: "info",
        module: "refinement-session",
        message: `Component "${component}" is registered under "${descriptor.domain}", not "${record.domain}"`,
      });
    }

    const existing = this.hypotheses.find((h) => h.component === component);
    const bound: ComponentHypothesis = existing ?? {
      component,
      domain: speculative ? record.domain : descriptor.domain,
      changeKind: record.impactType,
      probableChanges: probableChanges(record, record.impactType, descriptor),
      openQuestions: [],
      speculative,
      status: "confirmed",
    };
    bound.status = "confirmed";

    const index = this.hypotheses.indexOf(replaced);
    if (isPlaceholder(replaced.component)) {
      this.hypotheses.splice(index, 1, ...(existing ? [] : [bound]));
    } else {
      replaced.status = "rejected";
      if (!existing) this.hypotheses.splice(index + 1, 0, bound);
    }
    return OK;
  }

  private escalate(record: ImpactRecord, question: OpenQuestion): void {
    if (record.confidence !== "high") {
      record.reasoning.push(`escalated from ${record.confidence} to high by answer to "${question.id}"`);
      record.confidence = "high";
      if (record.impactType === "possible") {
        record.impactType = impactFor(findDomain(this.ontology, record.domain)?.kind ?? "business", "high");
      }
    }
    record.status = "confirmed";
  }

  private registerSpeculative(name: string, questionId: string): ComponentDescriptor {
    const descriptor: ComponentDescriptor = Object.freeze({
      name,
      domain: UNKNOWN_DOMAIN,
      type: "backend-service",
      apis: [],
      publishes: [],
      consumes: [],
      speculative: true,
    });
    this.overlay.set(name, descriptor);
    this.warnings.push({
      level: "warn",
      module: "refinement-session",
      message: `Unknown component "${name}" (answer to "${questionId}") added as a speculative catalog entry`,
    });
    return descriptor;
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────────

  private register(question: OpenQuestion): OpenQuestion {
    const existing = this.questions.get(question.id);
    if (existing) return existing;
    this.questions.set(question.id, question);
    return question;
  }

  private record(domain: string): ImpactRecord | undefined {
    return this.records.find((r) => r.domain === domain);
  }

  private hypothesesOf(domain: string): ComponentHypothesis[] {
    return this.hypotheses.filter((h) => h.domain === domain);
  }

  private hypothesisAsking(question: OpenQuestion): ComponentHypothesis | undefined {
    return this.hypotheses.find((h) => h.openQuestions.includes(question));
  }

  private blockingCount(): number {
    let count = 0;
    for (const q of this.questions.values()) if (isBlocking(q)) count++;
    return count;
  }

  private settledState(): SessionState {
    if (this.dispatched && this.questions.get(this.dispatched)?.state === "open") return "awaiting-answer";
    this.dispatched = undefined;
    return this.blockingCount() > 0 ? "open" : "resolved";
  }

  private refuse(reason: string): AnswerOutcome {
    return { accepted: false, state: this.current, spawned: [], reason };
  }
}

function cloneRecord(record: ImpactRecord): ImpactRecord {
  return {
    ...record,
    matchedTriggers: [...record.matchedTriggers],
    matchedEntities: [...record.matchedEntities],
    matchedActions: [...record.matchedActions],
    reasoning: [...record.reasoning],
    ...(record.tiedWith ? { tiedWith: [...record.tiedWith] } : {}),
  };
}

function cloneQuestion(question: OpenQuestion): OpenQuestion {
  return {
    ...question,
    subject: { ...question.subject, domains: [...question.subject.domains] },
    options: [...question.options],
    ...(question.answer ? { answer: { ...question.answer } } : {}),
  };
}

function cloneHypothesis(hypothesis: ComponentHypothesis): ComponentHypothesis {
  return {
    ...hypothesis,
    probableChanges: [...hypothesis.probableChanges],
    openQuestions: hypothesis.openQuestions.map(cloneQuestion),
  };
}
