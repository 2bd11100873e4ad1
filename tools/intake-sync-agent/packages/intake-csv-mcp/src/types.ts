export type FormAnswer = {
  name: string;
  value: string;
};

export type Appointment = {
  appointmentId: string;
  clientName: string;
  email: string;
  phone: string;
  datetime: string;
  appointmentType: string;
  canceled: boolean;
  dateCreated: string;
  answers: FormAnswer[];
};

export type AppointmentAction = "PROCESSED" | "CANCELLED" | "RESCHEDULED" | "FAILED";
